import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { existsSync } from 'fs';
import path from 'path';
import os from 'os';
import { createRunConfiguration } from '../../src/config';
import { buildArguments, prepareArguments, prepareReportDirectories } from '../../src/runner/ArgumentBuilder';
import { Logger } from '../../src/utils/logger';

function configure(input: Record<string, unknown> = {}) {
  return createRunConfiguration(input, { baseDir: '/work', defaultParallelForks: 2 });
}

/**
 * Number of times `option` is directly followed by `value`
 */
function optionCount(args: string[], option: string, value: string): number {
  return args.filter((arg, index) => arg === option && args[index + 1] === value).length;
}

describe('buildArguments', () => {
  describe('output mode', () => {
    it('should use -oDW when colour output is disabled', () => {
      const args = buildArguments(configure({ colorOutput: false }));

      expect(args).toContain('-oDW');
      expect(args).not.toContain('-oD');
    });

    it('should use -oD when colour output is enabled', () => {
      const args = buildArguments(configure({ colorOutput: true }));

      expect(args).toContain('-oD');
      expect(args).not.toContain('-oDW');
    });
  });

  describe('parallelism', () => {
    it('should emit a bare -PS when forks is 0', () => {
      const args = buildArguments(configure({ maxParallelForks: 0 }));

      expect(args).toContain('-PS');
      expect(args.filter(arg => arg.startsWith('-PS'))).toEqual(['-PS']);
    });

    it('should append the fork count to -PS', () => {
      const args = buildArguments(configure({ maxParallelForks: 5 }));

      expect(args).toContain('-PS5');
      expect(args).not.toContain('-PS');
    });

    it('should default to the configured fork count', () => {
      expect(buildArguments(configure())).toContain('-PS2');
    });
  });

  it('should escape spaces in the test root', () => {
    const args = buildArguments(configure({ testRoot: 'my tests/scala classes' }));

    expect(optionCount(args, '-R', '/work/my\\ tests/scala\\ classes')).toBe(1);
  });

  it('should translate include patterns to -z in order', () => {
    const args = buildArguments(configure({ includePatterns: ['popped', 'weasel'] }));
    const first = args.indexOf('popped');

    expect(args.slice(first - 1, first + 3)).toEqual(['-z', 'popped', '-z', 'weasel']);
  });

  describe('reports', () => {
    it('should add -u with the junit xml entry point when enabled', () => {
      const args = buildArguments(configure({
        reports: { junitXml: { enabled: true, destination: 'build/test-results' } }
      }));

      expect(optionCount(args, '-u', '/work/build/test-results')).toBe(1);
    });

    it('should add -h with the html destination when enabled', () => {
      const args = buildArguments(configure({
        reports: { html: { enabled: true, destination: 'build/reports/tests' } }
      }));

      expect(optionCount(args, '-h', '/work/build/reports/tests')).toBe(1);
    });

    it('should leave reports out when disabled', () => {
      const args = buildArguments(configure({
        reports: {
          junitXml: { enabled: false, destination: 'build/test-results' },
          html: { enabled: false, destination: 'build/reports/tests' }
        }
      }));

      expect(args).not.toContain('-u');
      expect(args).not.toContain('-h');
    });
  });

  describe('result file', () => {
    it('should pass the result file with -f', () => {
      const args = buildArguments(configure({ resultFilePath: '/tmp/result.txt' }));

      expect(optionCount(args, '-f', '/tmp/result.txt')).toBe(1);
    });

    it('should treat an empty result file as unset', () => {
      expect(buildArguments(configure({ resultFilePath: '' }))).not.toContain('-f');
    });
  });

  describe('tags', () => {
    it('should not specify tags by default', () => {
      const args = buildArguments(configure());

      expect(args).not.toContain('-n');
      expect(args).not.toContain('-l');
    });

    it('should add includes as -n', () => {
      const args = buildArguments(configure({ tagIncludes: ['bob', 'rita'] }));

      expect(optionCount(args, '-n', 'bob')).toBe(1);
      expect(optionCount(args, '-n', 'rita')).toBe(1);
    });

    it('should add excludes as -l', () => {
      const args = buildArguments(configure({ tagExcludes: ['jane', 'sue'] }));

      expect(optionCount(args, '-l', 'jane')).toBe(1);
      expect(optionCount(args, '-l', 'sue')).toBe(1);
    });
  });

  describe('suites', () => {
    it('should translate a suite to -s', () => {
      const args = buildArguments(configure({ suites: ['hello.World'] }));

      expect(optionCount(args, '-s', 'hello.World')).toBe(1);
    });

    it('should run distinct suites once each', () => {
      const args = buildArguments(configure({ suites: ['a', 'a', 'b'] }));

      expect(args.filter(arg => arg === '-s')).toHaveLength(2);
      expect(optionCount(args, '-s', 'a')).toBe(1);
      expect(optionCount(args, '-s', 'b')).toBe(1);
    });

    it('should emit nothing for an empty suite list', () => {
      expect(buildArguments(configure({ suites: [] }))).not.toContain('-s');
    });
  });

  describe('config entries', () => {
    it('should add string values', () => {
      expect(buildArguments(configure({ configEntries: { a: 'b' } }))).toContain('-Da=b');
    });

    it('should add number values', () => {
      expect(buildArguments(configure({ configEntries: { a: 1 } }))).toContain('-Da=1');
    });

    it('should add every entry of a map', () => {
      const args = buildArguments(configure({ configEntries: { a: 'b', c: 1 } }));

      expect(args).toContain('-Da=b');
      expect(args).toContain('-Dc=1');
    });
  });

  it('should keep the groups in runner order', () => {
    const args = buildArguments(configure({
      colorOutput: false,
      maxParallelForks: 4,
      testRoot: 'classes',
      includePatterns: ['popped'],
      reports: {
        junitXml: { enabled: true, destination: 'results' },
        html: { enabled: true, destination: 'html' }
      },
      resultFilePath: 'result.txt',
      tagIncludes: ['bob'],
      tagExcludes: ['jane'],
      suites: ['a'],
      configEntries: { a: 'b' }
    }));

    expect(args).toEqual([
      '-oDW',
      '-PS4',
      '-R', '/work/classes',
      '-z', 'popped',
      '-u', '/work/results',
      '-h', '/work/html',
      '-f', 'result.txt',
      '-n', 'bob',
      '-l', 'jane',
      '-s', 'a',
      '-Da=b'
    ]);
  });
});

describe('prepareReportDirectories', () => {
  let tempDir: string;
  let logger: Logger;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scalatest-launch-args-'));
    logger = Logger.create('argument-builder', path.join(tempDir, 'logs', 'debug.log'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should create the html destination recursively', async () => {
    const config = createRunConfiguration(
      { reports: { html: { enabled: true, destination: 'reports/tests/html' } } },
      { baseDir: tempDir }
    );

    await prepareReportDirectories(config, logger);

    expect(existsSync(path.join(tempDir, 'reports', 'tests', 'html'))).toBe(true);
  });

  it('should not create anything when the html report is disabled', async () => {
    const config = createRunConfiguration(
      { reports: { html: { enabled: false, destination: 'reports' } } },
      { baseDir: tempDir }
    );

    await prepareReportDirectories(config, logger);

    expect(existsSync(path.join(tempDir, 'reports'))).toBe(false);
  });

  it('should log the skipped directory to the logger it is given', async () => {
    const config = createRunConfiguration({}, { baseDir: tempDir });

    await prepareReportDirectories(config, logger);

    const log = await fs.readFile(logger.getLogPath(), 'utf8');
    expect(log).toContain(
      '[argument-builder] Decision: HTML report directory | {"choice":"skipped","reason":"html report disabled"}'
    );
  });

  it('should return the built arguments after preparing', async () => {
    const config = createRunConfiguration(
      { reports: { html: { enabled: true, destination: 'html' } } },
      { baseDir: tempDir, defaultParallelForks: 0 }
    );

    const args = await prepareArguments(config, logger);

    expect(existsSync(path.join(tempDir, 'html'))).toBe(true);
    expect(args).toEqual(buildArguments(config));
    expect(optionCount(args, '-h', path.join(tempDir, 'html'))).toBe(1);
  });
});
