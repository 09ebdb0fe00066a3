import * as fs from 'fs/promises';
import * as path from 'path';
import Papa from 'papaparse';
import { IListingRepository } from '../../domain/ports/IListingRepository.js';
import { LISTING_FIELDS, ListingRecord } from '../../domain/entities/Listing.js';

export function toCsv(records: readonly ListingRecord[]): string {
  const body = Papa.unparse(records.slice(), {
    columns: [...LISTING_FIELDS],
    header: false,
    newline: '\r\n',
  });
  const header = LISTING_FIELDS.join(',');
  return body ? `${header}\r\n${body}\r\n` : `${header}\r\n`;
}

export class CsvListingRepository implements IListingRepository {
  constructor(private readonly outputDir: string) {}

  async save(records: readonly ListingRecord[], filename: string): Promise<string> {
    await fs.mkdir(this.outputDir, { recursive: true });
    const file = path.join(this.outputDir, filename);
    await fs.writeFile(file, toCsv(records), 'utf8');
    return file;
  }
}
