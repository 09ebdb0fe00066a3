import { PageResult } from '../entities/Listing.js';

export interface IListingProvider {
  readonly name: string;
  readonly id: string;

  fetchPage(page: number, signal?: AbortSignal): Promise<PageResult>;
}
