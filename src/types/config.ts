export type ConfigValue = string | number;

export interface ReportSettings {
  readonly junitXmlEnabled: boolean;
  /** Directory the JUnit XML files are written into */
  readonly junitXmlEntryPointPath: string;
  readonly htmlEnabled: boolean;
  /** Usually `<htmlDestinationDir>/index.html` */
  readonly htmlEntryPointPath: string;
  readonly htmlDestinationDir: string;
}

/**
 * Immutable description of one runner invocation.
 * Built and validated by `createRunConfiguration`; never mutated afterwards.
 */
export interface RunConfiguration {
  readonly javaExecutable: string;
  readonly classpath: readonly string[];
  readonly jvmArgs: readonly string[];
  readonly systemProperties: Readonly<Record<string, ConfigValue>>;
  readonly minHeapSize?: string;
  readonly maxHeapSize?: string;
  /** Passed to the runner as its whole environment */
  readonly environment: Readonly<Record<string, string>>;
  readonly workingDirectory: string;
  /** 0 leaves the fork count to the runner */
  readonly maxParallelForks: number;
  readonly colorOutput: boolean;
  readonly testRoot: string;
  readonly includePatterns: readonly string[];
  readonly tagIncludes: readonly string[];
  readonly tagExcludes: readonly string[];
  readonly suites: readonly string[];
  readonly configEntries: Readonly<Record<string, ConfigValue>>;
  readonly resultFilePath?: string;
  readonly outputFilePath?: string;
  readonly errorFilePath?: string;
  readonly reportSettings: ReportSettings;
  readonly ignoreFailures: boolean;
}
