#!/usr/bin/env node
import { App } from './presentation/cli/App.js';
import { loadAppConfig } from './config/index.js';
import { MonitoringService } from './infrastructure/monitoring/MonitoringService.js';

async function main(): Promise<void> {
  const app = new App(loadAppConfig());
  const summary = await app.run();
  if (summary.state === 'ERRORED') {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  const errorMsg = error instanceof Error ? error.message : String(error);
  MonitoringService.getInstance().logCriticalError('App', errorMsg);
  process.exit(1);
});
