export type RunState = 'RUNNING' | 'INTERRUPTED' | 'ERRORED' | 'DONE';

export interface RunSummary {
  state: Exclude<RunState, 'RUNNING'>;
  totalRecords: number;
  pagesProcessed: number;
  elapsedMs: number;
  consecutiveEmpty: number;
  finalFile: string | null;
  error?: Error;
}
