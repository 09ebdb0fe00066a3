import { AppConfig } from '../../config/index.js';
import { RunSummary } from '../../domain/entities/RunState.js';

export class RunFormatter {
  private readonly separator = '='.repeat(60);

  formatHeader(config: AppConfig): string {
    return [
      '🚀 Starting PakWheels scraper...',
      `   Settings: Max retries=${config.maxAttempts}, Save interval=${config.saveInterval} pages`,
      `   Target pages: ${config.startPage}-${config.maxPages}`,
      `   Output: ${config.outputDir}`,
    ].join('\n');
  }

  formatSummary(summary: RunSummary): string {
    const seconds = summary.elapsedMs / 1000;
    const lines = [
      this.separator,
      '📈 Final Statistics:',
      `   Outcome: ${summary.state}`,
      `   Total cars collected: ${summary.totalRecords}`,
      `   Pages scraped: ${summary.pagesProcessed}`,
      `   Total time: ${seconds.toFixed(2)} seconds (${(seconds / 60).toFixed(2)} minutes)`,
      this.separator,
    ];

    if (summary.error) {
      lines.push(`❌ Run stopped by error: ${summary.error.message}`);
    }
    lines.push(summary.finalFile ? `✅ Scraping complete! Saved to ${summary.finalFile}` : '⚠️  No data collected');

    return lines.join('\n');
  }
}
