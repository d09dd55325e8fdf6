import { prepareArguments } from './runner/ArgumentBuilder';
import { OutcomeEvaluator } from './runner/OutcomeEvaluator';
import { ProcessLauncher } from './runner/ProcessLauncher';
import { RunConfiguration } from './types/config';
import { Outcome, WarningSink } from './types/outcome';
import { Logger } from './utils/logger';

export interface TestRunExecutorOptions {
  launcher?: ProcessLauncher;
  logger?: Logger;
}

/**
 * One invocation: build the arguments, run the runner, judge the exit code.
 * Launch failures propagate untouched, whatever ignoreFailures says.
 */
export class TestRunExecutor {
  private launcher: ProcessLauncher;
  private logger: Logger;

  constructor(options: TestRunExecutorOptions = {}) {
    this.logger = options.logger ?? Logger.create('test-run-executor');
    this.launcher = options.launcher ?? new ProcessLauncher(this.logger);
  }

  async execute(config: RunConfiguration, sink: WarningSink): Promise<Outcome> {
    this.logger.lifecycle('Preparing test run', {
      testRoot: config.testRoot,
      workingDirectory: config.workingDirectory
    });
    const args = await prepareArguments(config, this.logger);

    this.logger.lifecycle('Launching runner');
    const result = await this.launcher.launch(config, args);

    const outcome = new OutcomeEvaluator(sink, this.logger).evaluate(
      result.exitCode,
      config.ignoreFailures,
      config.reportSettings
    );
    this.logger.decision('Test run outcome', outcome.status, `exit code ${result.exitCode}`);
    return outcome;
  }
}

export async function execute(config: RunConfiguration, sink: WarningSink): Promise<Outcome> {
  return new TestRunExecutor().execute(config, sink);
}
