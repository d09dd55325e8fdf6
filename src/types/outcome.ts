export type Outcome =
  | { status: 'success' }
  | { status: 'warned'; message: string }
  | { status: 'failed'; message: string };

export interface ProcessOutcome {
  exitCode: number;
  /** Set when the runner was stopped by a signal instead of exiting */
  signal?: string;
  outputFile?: string;
  errorFile?: string;
}

/**
 * Receives the warning emitted when failing tests are tolerated
 */
export interface WarningSink {
  warn(message: string): void;
}
