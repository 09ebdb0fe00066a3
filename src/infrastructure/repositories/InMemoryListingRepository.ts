import { IListingRepository } from '../../domain/ports/IListingRepository.js';
import { ListingRecord } from '../../domain/entities/Listing.js';

export class InMemoryListingRepository implements IListingRepository {
  private readonly files = new Map<string, ListingRecord[]>();
  private readonly writes: string[] = [];

  async save(records: readonly ListingRecord[], filename: string): Promise<string> {
    this.files.set(filename, records.slice());
    this.writes.push(filename);
    return filename;
  }

  get(filename: string): ListingRecord[] | undefined {
    return this.files.get(filename);
  }

  /** Filenames in the order they were written, repeats included. */
  getWrites(): string[] {
    return [...this.writes];
  }
}
