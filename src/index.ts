export { createRunConfiguration, loadRunConfiguration, DEFAULT_CONFIG_FILE } from './config';
export type { ConfigurationOptions } from './config';
export { ConfigurationError, LaunchError, OutputCaptureError } from './errors';
export { buildArguments, prepareArguments, prepareReportDirectories } from './runner/ArgumentBuilder';
export { ProcessLauncher, allJvmArgs, buildCommandLine, RUNNER_MAIN_CLASS } from './runner/ProcessLauncher';
export { OutcomeEvaluator, failureMessage, isSuccessful, toClickableFileUrl } from './runner/OutcomeEvaluator';
export { TestRunExecutor, execute } from './TestRunExecutor';
export type { TestRunExecutorOptions } from './TestRunExecutor';
export type { ConfigValue, ReportSettings, RunConfiguration } from './types/config';
export type { Outcome, ProcessOutcome, WarningSink } from './types/outcome';
export { Logger } from './utils/logger';
