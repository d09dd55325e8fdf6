import { promises as fs } from 'fs';
import path from 'path';
import { RunConfiguration } from '../types/config';
import { Logger } from '../utils/logger';

/**
 * Runner arguments for one configuration, in the order the runner expects them.
 * Touches nothing on disk; run `prepareReportDirectories` first when the html report is on.
 */
export function buildArguments(config: RunConfiguration): string[] {
  const args: string[] = [];

  // Same reporter as the JUnit test task; W drops the colour codes
  args.push(config.colorOutput ? '-oD' : '-oDW');

  if (config.maxParallelForks === 0) {
    args.push('-PS');
  } else {
    args.push(`-PS${config.maxParallelForks}`);
  }

  args.push('-R', config.testRoot.replace(/ /g, '\\ '));

  for (const pattern of config.includePatterns) {
    args.push('-z', pattern);
  }

  const reports = config.reportSettings;
  if (reports.junitXmlEnabled) {
    args.push('-u', path.resolve(reports.junitXmlEntryPointPath));
  }
  if (reports.htmlEnabled) {
    args.push('-h', path.resolve(reports.htmlDestinationDir));
  }

  if (config.resultFilePath) {
    args.push('-f', config.resultFilePath);
  }

  for (const tag of config.tagIncludes) {
    args.push('-n', tag);
  }
  for (const tag of config.tagExcludes) {
    args.push('-l', tag);
  }

  for (const suite of new Set(config.suites)) {
    args.push('-s', suite);
  }

  for (const [key, value] of Object.entries(config.configEntries)) {
    args.push(`-D${key}=${value}`);
  }

  return args;
}

/**
 * The runner writes the html report into its destination without creating it
 */
export async function prepareReportDirectories(
  config: RunConfiguration,
  logger: Logger = Logger.create('argument-builder')
): Promise<void> {
  const reports = config.reportSettings;
  if (!reports.htmlEnabled) {
    logger.decision('HTML report directory', 'skipped', 'html report disabled');
    return;
  }
  const destination = path.resolve(reports.htmlDestinationDir);
  logger.debug('Ensuring html report directory exists', { destination });
  await fs.mkdir(destination, { recursive: true });
}

/**
 * Prepare the report directories, then build the arguments
 */
export async function prepareArguments(
  config: RunConfiguration,
  logger: Logger = Logger.create('argument-builder')
): Promise<string[]> {
  await prepareReportDirectories(config, logger);
  const args = buildArguments(config);
  logger.debug('Built runner arguments', { args });
  return args;
}
