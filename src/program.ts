import { Command, InvalidArgumentError } from 'commander';
import { existsSync } from 'fs';
import path from 'path';
import { chalk, quote } from 'zx';
import { createRunConfiguration, DEFAULT_CONFIG_FILE, readConfigurationFile } from './config';
import { prepareArguments } from './runner/ArgumentBuilder';
import { isSuccessful } from './runner/OutcomeEvaluator';
import { buildCommandLine } from './runner/ProcessLauncher';
import { TestRunExecutor } from './TestRunExecutor';
import { RunConfiguration } from './types/config';
import { WarningSink } from './types/outcome';
import { Logger } from './utils/logger';

export interface RunCommandOptions {
  config?: string;
  java?: string;
  classpath?: string;
  testRoot?: string;
  workingDir?: string;
  suite?: string[];
  include?: string[];
  tag?: string[];
  excludeTag?: string[];
  forks?: number;
  color: boolean;
  ignoreFailures?: boolean;
  testOutput?: string;
  testError?: string;
  testResult?: string;
}

function parseForks(value: string): number {
  const forks = Number(value);
  if (!Number.isInteger(forks) || forks < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return forks;
}

function ambientEnvironment(): Record<string, string> {
  const environment: Record<string, string> = {};
  for (const [name, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      environment[name] = value;
    }
  }
  return environment;
}

/**
 * Command-line flags win over the config file; their paths are relative to cwd
 */
function commandLineOverrides(options: RunCommandOptions, cwd: string): Record<string, unknown> {
  const resolve = (value: string) => (value ? path.resolve(cwd, value) : value);
  const overrides: Record<string, unknown> = {};

  if (options.java !== undefined) overrides.javaExecutable = options.java;
  if (options.classpath !== undefined) {
    overrides.classpath = options.classpath.split(path.delimiter).filter(entry => entry.length > 0);
  }
  if (options.testRoot !== undefined) overrides.testRoot = resolve(options.testRoot);
  if (options.workingDir !== undefined) overrides.workingDirectory = resolve(options.workingDir);
  if (options.suite !== undefined) overrides.suites = options.suite;
  if (options.include !== undefined) overrides.includePatterns = options.include;
  if (options.tag !== undefined) overrides.tagIncludes = options.tag;
  if (options.excludeTag !== undefined) overrides.tagExcludes = options.excludeTag;
  if (options.forks !== undefined) overrides.maxParallelForks = options.forks;
  if (!options.color) overrides.colorOutput = false;
  if (options.ignoreFailures) overrides.ignoreFailures = true;
  if (options.testOutput !== undefined) overrides.outputFilePath = resolve(options.testOutput);
  if (options.testError !== undefined) overrides.errorFilePath = resolve(options.testError);
  if (options.testResult !== undefined) overrides.resultFilePath = options.testResult;

  return overrides;
}

/**
 * Merge the config file (explicit, or scalatest-launch.json when present) with the flags
 */
export async function resolveConfiguration(
  options: RunCommandOptions,
  cwd: string = process.cwd()
): Promise<RunConfiguration> {
  const defaultFile = path.join(cwd, DEFAULT_CONFIG_FILE);
  const configPath = options.config
    ? path.resolve(cwd, options.config)
    : existsSync(defaultFile) ? defaultFile : undefined;

  const fileInput = configPath ? await readConfigurationFile(configPath) : {};
  return createRunConfiguration(
    { ...fileInput, ...commandLineOverrides(options, cwd) },
    {
      baseDir: configPath ? path.dirname(configPath) : cwd,
      defaultEnvironment: ambientEnvironment()
    }
  );
}

function addRunOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', `JSON configuration file (default: ${DEFAULT_CONFIG_FILE} if present)`)
    .option('--java <executable>', 'Java executable used to start the runner')
    .option('--classpath <entries>', `Classpath entries separated by "${path.delimiter}"`)
    .option('-R, --test-root <dir>', 'Directory containing the compiled tests')
    .option('--working-dir <dir>', 'Working directory of the runner')
    .option('-s, --suite <names...>', 'Suites to run')
    .option('-z, --include <patterns...>', 'Test name filters')
    .option('-n, --tag <tags...>', 'Tags to include')
    .option('-l, --exclude-tag <tags...>', 'Tags to exclude')
    .option('--forks <count>', 'Parallel forks for the runner, 0 for its default', parseForks)
    .option('--no-color', 'Disable coloured runner output')
    .option('--ignore-failures', 'Report failing tests as a warning')
    .option('--test-output <file>', 'Write runner stdout to this file')
    .option('--test-error <file>', 'Write runner stderr to this file')
    .option('--test-result <file>', 'Ask the runner for a result file');
}

function reportError(logger: Logger, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  logger.error('Command failed', error);
  console.error(chalk.red(message));
  process.exitCode = 1;
}

export function createProgram(executor: Pick<TestRunExecutor, 'execute'> = new TestRunExecutor()): Command {
  const logger = Logger.create('cli');
  const program = new Command();

  program
    .name('scalatest-launch')
    .description('Run ScalaTest suites from a declarative configuration')
    .version('0.1.0');

  addRunOptions(program.command('run'))
    .description('Run the tests and fail on failing tests')
    .action(async (options: RunCommandOptions) => {
      try {
        const config = await resolveConfiguration(options);
        const sink: WarningSink = {
          warn: (message: string) => {
            logger.warn(message);
            console.warn(chalk.yellow(message));
          }
        };
        const outcome = await executor.execute(config, sink);
        if (!isSuccessful(outcome)) {
          console.error(chalk.red(outcome.message));
          process.exitCode = 1;
        }
      } catch (error) {
        reportError(logger, error);
      }
    });

  addRunOptions(program.command('print-command'))
    .description('Print the runner command line without starting it')
    .action(async (options: RunCommandOptions) => {
      try {
        const config = await resolveConfiguration(options);
        const args = await prepareArguments(config, logger);
        console.log(buildCommandLine(config, args).map(token => quote(token)).join(' '));
      } catch (error) {
        reportError(logger, error);
      }
    });

  return program;
}
