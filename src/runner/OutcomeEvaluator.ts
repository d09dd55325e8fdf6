import path from 'path';
import { pathToFileURL } from 'url';
import { ReportSettings } from '../types/config';
import { Outcome, WarningSink } from '../types/outcome';
import { Logger } from '../utils/logger';

export const FAILING_TESTS_MESSAGE = 'There were failing tests';

/**
 * Clickable `file://` form of a report entry point
 */
export function toClickableFileUrl(entryPoint: string): string {
  return pathToFileURL(path.resolve(entryPoint)).href;
}

export function failureMessage(reports: ReportSettings): string {
  if (reports.htmlEnabled) {
    return `${FAILING_TESTS_MESSAGE}. See the report at: ${toClickableFileUrl(reports.htmlEntryPointPath)}`;
  }
  if (reports.junitXmlEnabled) {
    return `${FAILING_TESTS_MESSAGE}. See the results at: ${toClickableFileUrl(reports.junitXmlEntryPointPath)}`;
  }
  return FAILING_TESTS_MESSAGE;
}

export class OutcomeEvaluator {
  private sink: WarningSink;
  private logger: Logger;

  constructor(sink: WarningSink, logger: Logger = Logger.create('outcome-evaluator')) {
    this.sink = sink;
    this.logger = logger;
  }

  /**
   * Every nonzero exit code counts as failing tests
   */
  evaluate(exitCode: number, ignoreFailures: boolean, reports: ReportSettings): Outcome {
    if (exitCode === 0) {
      this.logger.decision('Runner exit code', 'success', 'exit code 0');
      return { status: 'success' };
    }

    const message = failureMessage(reports);
    if (ignoreFailures) {
      this.logger.decision('Runner exit code', 'warned', `exit code ${exitCode}, failures ignored`);
      this.sink.warn(message);
      return { status: 'warned', message };
    }
    this.logger.decision('Runner exit code', 'failed', `exit code ${exitCode}`);
    return { status: 'failed', message };
  }
}

/**
 * Warned runs still count as successful build steps
 */
export function isSuccessful(outcome: Outcome): outcome is Exclude<Outcome, { status: 'failed' }> {
  return outcome.status !== 'failed';
}
