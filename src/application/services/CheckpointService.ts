import { IListingRepository } from '../../domain/ports/IListingRepository.js';
import { ListingRecord } from '../../domain/entities/Listing.js';
import { ILogger, LoggerFactory } from '../../infrastructure/logging/Logger.js';

export class CheckpointService {
  private readonly logger: ILogger;

  constructor(
    private readonly repository: IListingRepository,
    private readonly saveInterval: number,
    private readonly filePrefix: string
  ) {
    this.logger = LoggerFactory.create('CheckpointService');
  }

  backupFileName(page: number): string {
    return `${this.filePrefix}_backup_page${page}.csv`;
  }

  finalFileName(): string {
    return `${this.filePrefix}_final.csv`;
  }

  isDue(page: number): boolean {
    return page % this.saveInterval === 0;
  }

  /** Writes a page-numbered backup when `page` lands on the save interval; returns the file written, if any. */
  async checkpoint(records: readonly ListingRecord[], page: number): Promise<string | null> {
    if (!this.isDue(page)) return null;

    const file = await this.repository.save(records, this.backupFileName(page));
    this.logger.info(`💾 Saved to ${file}`);
    this.logger.info(`✅ Checkpoint saved at page ${page}`, { records: records.length });
    return file;
  }

  /** Writes the final file, unless nothing was ever collected. */
  async saveFinal(records: readonly ListingRecord[]): Promise<string | null> {
    if (records.length === 0) {
      this.logger.warn('⚠️ No data collected, final file not written');
      return null;
    }

    const file = await this.repository.save(records, this.finalFileName());
    this.logger.info(`💾 Saved to ${file}`, { records: records.length });
    return file;
  }
}
