import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { ConfigurationError } from './errors';
import { ConfigValue, ReportSettings, RunConfiguration } from './types/config';

export const DEFAULT_CONFIG_FILE = 'scalatest-launch.json';

export interface ConfigurationOptions {
  /** Relative paths in the input resolve against this directory */
  baseDir?: string;
  /** Fork count used when the input leaves maxParallelForks out */
  defaultParallelForks?: number;
  /** Environment used when the input leaves environment out */
  defaultEnvironment?: Record<string, string>;
}

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readObject(source: RawObject, key: string, field: string): RawObject | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (!isObject(value)) {
    throw new ConfigurationError(field, 'expected an object');
  }
  return value;
}

function readString(source: RawObject, key: string, field: string): string | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigurationError(field, 'expected a string');
  }
  return value;
}

function readBoolean(source: RawObject, key: string, field: string, fallback: boolean): boolean {
  const value = source[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(field, 'expected true or false');
  }
  return value;
}

function readStringArray(source: RawObject, key: string, field: string): string[] {
  const value = source[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new ConfigurationError(field, 'expected a list of strings');
  }
  return value.map((item: unknown, index) => {
    if (typeof item !== 'string') {
      throw new ConfigurationError(`${field}[${index}]`, 'expected a string');
    }
    return item;
  });
}

function readEnvironment(source: RawObject, key: string, field: string): Record<string, string> | undefined {
  const value = readObject(source, key, field);
  if (!value) return undefined;
  const environment: Record<string, string> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new ConfigurationError(`${field}.${name}`, 'expected a string');
    }
    environment[name] = entry;
  }
  return environment;
}

function readValues(source: RawObject, key: string, field: string): Record<string, ConfigValue> {
  const value = readObject(source, key, field);
  const values: Record<string, ConfigValue> = {};
  if (!value) return values;
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry === 'string' || (typeof entry === 'number' && Number.isFinite(entry))) {
      values[name] = entry;
    } else {
      throw new ConfigurationError(`${field}.${name}`, 'expected a string or a number');
    }
  }
  return values;
}

function readForks(source: RawObject, fallback: number): number {
  const value = source.maxParallelForks;
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigurationError('maxParallelForks', 'expected a non-negative integer');
  }
  return value;
}

/**
 * An empty string means "not configured", same as leaving the key out
 */
function readOptionalPath(source: RawObject, key: string, field: string, baseDir: string): string | undefined {
  const value = readString(source, key, field);
  if (!value) return undefined;
  return path.resolve(baseDir, value);
}

function resolveExecutable(executable: string, baseDir: string): string {
  // Bare names are looked up on PATH at launch time
  return executable.includes('/') || executable.includes(path.sep)
    ? path.resolve(baseDir, executable)
    : executable;
}

function readReportSettings(source: RawObject, baseDir: string): ReportSettings {
  const reports = readObject(source, 'reports', 'reports') ?? {};
  const junitXml = readObject(reports, 'junitXml', 'reports.junitXml') ?? {};
  const html = readObject(reports, 'html', 'reports.html') ?? {};

  const junitXmlEnabled = readBoolean(junitXml, 'enabled', 'reports.junitXml.enabled', false);
  const junitXmlDestination = readOptionalPath(junitXml, 'destination', 'reports.junitXml.destination', baseDir);
  if (junitXmlEnabled && !junitXmlDestination) {
    throw new ConfigurationError('reports.junitXml.destination', 'required when the report is enabled');
  }

  const htmlEnabled = readBoolean(html, 'enabled', 'reports.html.enabled', false);
  const htmlDestination = readOptionalPath(html, 'destination', 'reports.html.destination', baseDir);
  if (htmlEnabled && !htmlDestination) {
    throw new ConfigurationError('reports.html.destination', 'required when the report is enabled');
  }
  const htmlEntryPoint = readOptionalPath(html, 'entryPoint', 'reports.html.entryPoint', baseDir)
    ?? (htmlDestination ? path.join(htmlDestination, 'index.html') : '');

  return {
    junitXmlEnabled,
    junitXmlEntryPointPath: junitXmlDestination ?? '',
    htmlEnabled,
    htmlEntryPointPath: htmlEntryPoint,
    htmlDestinationDir: htmlDestination ?? ''
  };
}

/**
 * Validate a plain object (parsed JSON, CLI flags) into a frozen RunConfiguration
 */
export function createRunConfiguration(input: unknown, options: ConfigurationOptions = {}): RunConfiguration {
  if (!isObject(input)) {
    throw new ConfigurationError('(root)', 'expected an object');
  }
  const baseDir = path.resolve(options.baseDir ?? process.cwd());

  const javaExecutable = readString(input, 'javaExecutable', 'javaExecutable') || 'java';
  const workingDirectory = readOptionalPath(input, 'workingDirectory', 'workingDirectory', baseDir) ?? baseDir;
  const environment = readEnvironment(input, 'environment', 'environment')
    ?? { ...options.defaultEnvironment };

  const config: RunConfiguration = {
    javaExecutable: resolveExecutable(javaExecutable, baseDir),
    classpath: Object.freeze(readStringArray(input, 'classpath', 'classpath')),
    jvmArgs: Object.freeze(readStringArray(input, 'jvmArgs', 'jvmArgs')),
    systemProperties: Object.freeze(readValues(input, 'systemProperties', 'systemProperties')),
    minHeapSize: readString(input, 'minHeapSize', 'minHeapSize') || undefined,
    maxHeapSize: readString(input, 'maxHeapSize', 'maxHeapSize') || undefined,
    environment: Object.freeze(environment),
    workingDirectory,
    maxParallelForks: readForks(input, options.defaultParallelForks ?? os.availableParallelism()),
    colorOutput: readBoolean(input, 'colorOutput', 'colorOutput', true),
    testRoot: readOptionalPath(input, 'testRoot', 'testRoot', baseDir) ?? path.join(baseDir, 'build', 'classes'),
    includePatterns: Object.freeze(readStringArray(input, 'includePatterns', 'includePatterns')),
    tagIncludes: Object.freeze(readStringArray(input, 'tagIncludes', 'tagIncludes')),
    tagExcludes: Object.freeze(readStringArray(input, 'tagExcludes', 'tagExcludes')),
    suites: Object.freeze(readStringArray(input, 'suites', 'suites')),
    configEntries: Object.freeze(readValues(input, 'configEntries', 'configEntries')),
    // Handed to the runner as written; the runner resolves it against its own working directory
    resultFilePath: readString(input, 'resultFilePath', 'resultFilePath') || undefined,
    outputFilePath: readOptionalPath(input, 'outputFilePath', 'outputFilePath', baseDir),
    errorFilePath: readOptionalPath(input, 'errorFilePath', 'errorFilePath', baseDir),
    reportSettings: Object.freeze(readReportSettings(input, baseDir)),
    ignoreFailures: readBoolean(input, 'ignoreFailures', 'ignoreFailures', false)
  };

  return Object.freeze(config);
}

/**
 * Read a JSON configuration file; relative paths inside it resolve against its directory
 */
export async function readConfigurationFile(configPath: string): Promise<RawObject> {
  const content = await fs.readFile(configPath, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(configPath, `not valid JSON (${reason})`);
  }
  if (!isObject(parsed)) {
    throw new ConfigurationError(configPath, 'expected a JSON object');
  }
  return parsed;
}

export async function loadRunConfiguration(
  configPath: string,
  options: Omit<ConfigurationOptions, 'baseDir'> = {}
): Promise<RunConfiguration> {
  const absolutePath = path.resolve(configPath);
  const input = await readConfigurationFile(absolutePath);
  return createRunConfiguration(input, { ...options, baseDir: path.dirname(absolutePath) });
}
