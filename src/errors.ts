/**
 * Raised once, while building a RunConfiguration, for input that cannot describe a run
 */
export class ConfigurationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid configuration for "${field}": ${message}`);
    this.name = 'ConfigurationError';
    this.field = field;
  }
}

/**
 * The runner process could not be started at all.
 * Never downgraded by ignoreFailures.
 */
export class LaunchError extends Error {
  readonly commandLine: readonly string[];

  constructor(message: string, commandLine: readonly string[], cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'LaunchError';
    this.commandLine = commandLine;
  }
}

/**
 * The runner finished but its redirected output could not be written out completely
 */
export class OutputCaptureError extends Error {
  readonly commandLine: readonly string[];
  readonly exitCode: number;
  readonly filePath: string;

  constructor(filePath: string, exitCode: number, commandLine: readonly string[], cause: unknown) {
    super(`Failed to write runner output to ${filePath} (runner exit code ${exitCode})`, { cause });
    this.name = 'OutputCaptureError';
    this.filePath = filePath;
    this.exitCode = exitCode;
    this.commandLine = commandLine;
  }
}
