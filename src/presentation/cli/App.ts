import { CheckpointService } from '../../application/services/CheckpointService.js';
import { ScrapeListingsUseCase } from '../../application/usecases/ScrapeListingsUseCase.js';
import { AppConfig } from '../../config/index.js';
import { RunSummary } from '../../domain/entities/RunState.js';
import { FileLogger } from '../../infrastructure/logging/FileLogger.js';
import { ILogger, LoggerFactory } from '../../infrastructure/logging/Logger.js';
import { MonitoringService } from '../../infrastructure/monitoring/MonitoringService.js';
import { ProviderFactory } from '../../infrastructure/providers/index.js';
import { CsvListingRepository } from '../../infrastructure/repositories/CsvListingRepository.js';
import { RunFormatter } from './RunFormatter.js';

export class App {
  private readonly logger: ILogger;
  private readonly formatter = new RunFormatter();
  private readonly abortController = new AbortController();

  constructor(private readonly appConfig: AppConfig) {
    LoggerFactory.setLevel(appConfig.logLevel);
    this.logger = LoggerFactory.create('App');
  }

  async run(): Promise<RunSummary> {
    const monitoring = MonitoringService.create(FileLogger.configure(this.appConfig.logDir));
    const provider = new ProviderFactory(this.appConfig).createProvider((failure, attempts) =>
      monitoring.onPageFailed(failure, attempts)
    );
    const checkpoints = new CheckpointService(
      new CsvListingRepository(this.appConfig.outputDir),
      this.appConfig.saveInterval,
      this.appConfig.outputPrefix
    );
    const useCase = new ScrapeListingsUseCase(
      provider,
      checkpoints,
      {
        startPage: this.appConfig.startPage,
        maxPages: this.appConfig.maxPages,
        pageDelayMs: this.appConfig.pageDelayMs,
        emptyPageDelayMs: this.appConfig.emptyPageDelayMs,
        maxConsecutiveEmptyPages: this.appConfig.maxConsecutiveEmptyPages,
      },
      monitoring
    );

    console.log(this.formatter.formatHeader(this.appConfig));
    console.log('Press Ctrl+C to stop and save what has been collected.\n');

    const removeHandlers = this.setupShutdownHandlers();
    try {
      const summary = await useCase.run(this.abortController.signal);
      console.log(`\n${this.formatter.formatSummary(summary)}\n`);
      return summary;
    } finally {
      removeHandlers();
    }
  }

  private setupShutdownHandlers(): () => void {
    const shutdown = (signal: NodeJS.Signals): void => {
      if (this.abortController.signal.aborted) {
        this.logger.warn(`Received ${signal} again, exiting without waiting for the final save`);
        process.exit(130);
      }
      console.log(`\nReceived ${signal}, finishing up...`);
      this.abortController.abort();
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    return () => {
      process.off('SIGINT', shutdown);
      process.off('SIGTERM', shutdown);
    };
  }
}
