import { spawn } from 'child_process';
import { constants as fsConstants, promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { Readable, Writable } from 'stream';
import { finished } from 'stream/promises';
import { which } from 'zx';
import { LaunchError, OutputCaptureError } from '../errors';
import { RunConfiguration } from '../types/config';
import { ProcessOutcome } from '../types/outcome';
import { Logger } from '../utils/logger';

export const RUNNER_MAIN_CLASS = 'org.scalatest.tools.Runner';

/**
 * Explicit JVM flags followed by system properties and heap sizes
 */
export function allJvmArgs(config: RunConfiguration): string[] {
  const args = [...config.jvmArgs];
  for (const [key, value] of Object.entries(config.systemProperties)) {
    args.push(`-D${key}=${value}`);
  }
  if (config.minHeapSize) {
    args.push(`-Xms${config.minHeapSize}`);
  }
  if (config.maxHeapSize) {
    args.push(`-Xmx${config.maxHeapSize}`);
  }
  return args;
}

/**
 * Full command line of the runner process, executable first
 */
export function buildCommandLine(config: RunConfiguration, args: readonly string[]): string[] {
  const commandLine = [config.javaExecutable, ...allJvmArgs(config)];
  if (config.classpath.length > 0) {
    commandLine.push('-cp', config.classpath.join(path.delimiter));
  }
  commandLine.push(RUNNER_MAIN_CLASS, ...args);
  return commandLine;
}

/**
 * A redirect target; `closed` settles with the stream's error, if any, once it is done
 */
interface OutputSink {
  filePath: string;
  stream: Writable;
  closed: Promise<unknown>;
}

interface RunnerExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

async function openSink(filePath: string): Promise<OutputSink> {
  const handle = await fs.open(filePath, 'w');
  const stream = handle.createWriteStream();
  const closed = finished(stream).then(
    () => undefined,
    (error: unknown) => error
  );
  return { filePath, stream, closed };
}

function closeSink(sink: OutputSink): Promise<unknown> {
  if (!sink.stream.writableEnded && !sink.stream.destroyed) {
    sink.stream.end();
  }
  return sink.closed;
}

function drainInto(source: Readable | null, sink: OutputSink | undefined): void {
  if (!source || !sink) return;
  source.pipe(sink.stream);
  // A failed sink unpipes; keep reading so the runner never blocks on a full pipe
  void sink.closed.then(error => {
    if (error) source.resume();
  });
}

export class ProcessLauncher {
  private logger: Logger;

  constructor(logger: Logger = Logger.create('process-launcher')) {
    this.logger = logger;
  }

  /**
   * Run the runner to completion and report its exit code.
   * A nonzero exit is returned, not thrown; only a process that never started throws.
   */
  async launch(config: RunConfiguration, args: readonly string[]): Promise<ProcessOutcome> {
    const commandLine = buildCommandLine(config, args);
    const executable = await this.resolveExecutable(config, commandLine);
    await this.checkWorkingDirectory(config, commandLine);

    const opened: OutputSink[] = [];
    try {
      const stdout = await this.openRedirect(config.outputFilePath, commandLine);
      if (stdout) opened.push(stdout);
      const stderr = await this.openRedirect(config.errorFilePath, commandLine);
      if (stderr) opened.push(stderr);

      this.logger.command(executable, commandLine.slice(1));
      const exit = await this.waitForExit(executable, commandLine, config, stdout, stderr);

      const outcome: ProcessOutcome = {
        exitCode: exit.code ?? this.signalExitCode(exit.signal),
        outputFile: config.outputFilePath,
        errorFile: config.errorFilePath
      };
      if (exit.signal) {
        outcome.signal = exit.signal;
      }

      for (const sink of opened) {
        const error = await closeSink(sink);
        if (error) {
          this.logger.error('Runner output was not fully written', error, { filePath: sink.filePath });
          throw new OutputCaptureError(sink.filePath, outcome.exitCode, commandLine, error);
        }
      }

      this.logger.lifecycle('Runner finished', { exitCode: outcome.exitCode, signal: outcome.signal });
      return outcome;
    } finally {
      await Promise.all(opened.map(closeSink));
    }
  }

  private waitForExit(
    executable: string,
    commandLine: string[],
    config: RunConfiguration,
    stdout: OutputSink | undefined,
    stderr: OutputSink | undefined
  ): Promise<RunnerExit> {
    return new Promise((resolve, reject) => {
      // No shell in between: the runner sees exactly the configured environment
      const child = spawn(executable, commandLine.slice(1), {
        cwd: config.workingDirectory,
        env: { ...config.environment },
        stdio: ['ignore', stdout ? 'pipe' : 'inherit', stderr ? 'pipe' : 'inherit']
      });

      child.once('error', error => {
        this.logger.error('Runner did not start', error);
        reject(new LaunchError(`Failed to start the test runner: ${error.message}`, commandLine, error));
      });

      drainInto(child.stdout, stdout);
      drainInto(child.stderr, stderr);

      child.once('close', (code, signal) => resolve({ code, signal }));
    });
  }

  private async resolveExecutable(config: RunConfiguration, commandLine: string[]): Promise<string> {
    if (path.isAbsolute(config.javaExecutable)) {
      await this.checkExecutable(config.javaExecutable, commandLine);
      return config.javaExecutable;
    }
    const searchPath = config.environment.PATH ?? process.env.PATH;
    const resolved = await which(config.javaExecutable, { path: searchPath, nothrow: true });
    if (!resolved) {
      throw new LaunchError(`Cannot find an executable named ${config.javaExecutable}`, commandLine);
    }
    this.logger.decision('Runner executable', resolved, `resolved from ${config.javaExecutable}`);
    return resolved;
  }

  private async checkExecutable(executable: string, commandLine: string[]): Promise<void> {
    try {
      await fs.access(executable, fsConstants.F_OK);
    } catch (error) {
      throw new LaunchError(`Cannot find an executable named ${executable}`, commandLine, error);
    }
    try {
      await fs.access(executable, fsConstants.X_OK);
    } catch (error) {
      throw new LaunchError(`Permission denied: cannot execute ${executable}`, commandLine, error);
    }
  }

  private async checkWorkingDirectory(config: RunConfiguration, commandLine: string[]): Promise<void> {
    let isDirectory: boolean;
    try {
      isDirectory = (await fs.stat(config.workingDirectory)).isDirectory();
    } catch (error) {
      throw new LaunchError(`Working directory is not accessible: ${config.workingDirectory}`, commandLine, error);
    }
    if (!isDirectory) {
      throw new LaunchError(`Working directory is not a directory: ${config.workingDirectory}`, commandLine);
    }
  }

  private async openRedirect(filePath: string | undefined, commandLine: string[]): Promise<OutputSink | undefined> {
    if (!filePath) return undefined;
    this.logger.debug('Redirecting runner output', { filePath });
    try {
      return await openSink(filePath);
    } catch (error) {
      throw new LaunchError(`Cannot open ${filePath} for writing`, commandLine, error);
    }
  }

  private signalExitCode(signal: string | null): number {
    const match = Object.entries(os.constants.signals).find(([name]) => name === signal);
    return match ? 128 + match[1] : 1;
  }
}
