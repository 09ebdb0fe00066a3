import { ListingRecord } from '../entities/Listing.js';

export interface IListingRepository {
  /** Overwrites `filename` with the whole collection and returns where it was written. */
  save(records: readonly ListingRecord[], filename: string): Promise<string>;
}
