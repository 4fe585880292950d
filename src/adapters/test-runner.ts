import { readFile } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';
import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { StageExecutionError, errorMessage } from '../shared/errors.js';
import { runCommand, stderrTail, type SpawnFn } from '../runtime/process.js';

export interface TestRequest {
  projectDir: string;
  /** argv of the test command, e.g. `["pytest", "--junitxml=reports/junit.xml"]`. */
  command: readonly string[];
  /** JUnit XML report written by the command, relative to `projectDir`. */
  reportPath: string;
  signal?: AbortSignal;
}

export interface TestSummary {
  tests: number;
  failures: number;
  errors: number;
  skipped: number;
  reportPath: string;
}

export interface TestRunner {
  run(req: TestRequest): Promise<TestSummary>;
}

export interface TestRunnerOptions {
  spawn?: SpawnFn;
}

const Count = z
  .union([z.string(), z.number()])
  .optional()
  .transform((v) => (v === undefined ? 0 : Number(v) || 0));

const SuiteSchema = z
  .object({
    '@_tests': Count,
    '@_failures': Count,
    '@_errors': Count,
    '@_skipped': Count,
  })
  .passthrough();

const JUnitSchema = z
  .object({
    testsuites: z
      .union([z.object({ testsuite: z.array(SuiteSchema).optional() }).passthrough(), z.literal('')])
      .optional(),
    testsuite: z.array(SuiteSchema).optional(),
  })
  .passthrough();

/** Totals across every <testsuite> of a JUnit XML document. */
export function parseJUnitReport(xml: string): Omit<TestSummary, 'reportPath'> {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    isArray: (name) => name === 'testsuite',
  });
  const parsed: unknown = parser.parse(xml);
  const doc = JUnitSchema.parse(parsed);

  if (doc.testsuites === undefined && doc.testsuite === undefined) {
    throw new Error('not a JUnit report: no <testsuites> or <testsuite> element');
  }

  const suites = [...(doc.testsuite ?? []), ...(doc.testsuites ? doc.testsuites.testsuite ?? [] : [])];
  return suites.reduce(
    (acc, s) => ({
      tests: acc.tests + s['@_tests'],
      failures: acc.failures + s['@_failures'],
      errors: acc.errors + s['@_errors'],
      skipped: acc.skipped + s['@_skipped'],
    }),
    { tests: 0, failures: 0, errors: 0, skipped: 0 },
  );
}

/**
 * Runs the project's test command and gates on its JUnit report: a missing
 * report, a non-zero exit, or any failure or error fails the stage.
 */
export class JUnitTestRunner implements TestRunner {
  constructor(private readonly opts: TestRunnerOptions = {}) {}

  async run(req: TestRequest): Promise<TestSummary> {
    const [bin, ...args] = req.command;
    if (!bin) {
      throw new StageExecutionError('Test command is empty');
    }

    const result = await runCommand(bin, args, {
      cwd: req.projectDir,
      signal: req.signal,
      spawn: this.opts.spawn,
      label: 'test',
    });

    const reportPath = isAbsolute(req.reportPath) ? req.reportPath : join(req.projectDir, req.reportPath);
    let totals: Omit<TestSummary, 'reportPath'>;
    try {
      totals = parseJUnitReport(await readFile(reportPath, 'utf8'));
    } catch (err) {
      const exitNote = result.exitCode !== 0 ? ` (test command exited ${result.exitCode}: ${stderrTail(result)})` : '';
      throw new StageExecutionError(`Test report ${reportPath} unusable: ${errorMessage(err)}${exitNote}`, {
        exitCode: result.exitCode,
      });
    }

    const summary: TestSummary = { ...totals, reportPath };
    if (result.exitCode !== 0 || summary.failures > 0 || summary.errors > 0) {
      throw new StageExecutionError(
        `Tests failed: ${summary.failures} failure(s), ${summary.errors} error(s) of ${summary.tests} (exit ${result.exitCode})`,
        { exitCode: result.exitCode },
      );
    }
    return summary;
  }
}
