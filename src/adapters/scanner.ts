import { mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { StageExecutionError, errorMessage } from '../shared/errors.js';
import { runCommand, stderrTail, type SpawnFn } from '../runtime/process.js';
import type { AdvisoryScanFinding } from '../runtime/types.js';

export type ScanTarget = { kind: 'fs'; path: string } | { kind: 'image'; ref: string };

export interface ScanRequest {
  target: ScanTarget;
  /** Comma-separated severities, e.g. `HIGH,CRITICAL`. */
  severity: string;
  reportPath: string;
  signal?: AbortSignal;
}

export interface ScanResult {
  passed: boolean;
  findings: AdvisoryScanFinding[];
  reportPath: string;
  /** Why the report could not be read; `findings` is then empty. */
  reportError?: string;
}

export interface Scanner {
  scan(req: ScanRequest): Promise<ScanResult>;
}

export interface TrivyScannerOptions {
  trivyBin?: string;
  spawn?: SpawnFn;
}

// Exit code trivy uses when findings at or above the severity filter exist.
const FINDINGS_EXIT_CODE = 1;

const TrivyReportSchema = z.object({
  Results: z
    .array(
      z.object({
        Target: z.string(),
        Vulnerabilities: z
          .array(z.object({ VulnerabilityID: z.string(), Severity: z.string() }).passthrough())
          .nullish(),
      }).passthrough(),
    )
    .nullish(),
}).passthrough();

/** Count vulnerabilities per (target, severity) from a trivy JSON report. */
export function summarizeTrivyReport(raw: unknown): AdvisoryScanFinding[] {
  const report = TrivyReportSchema.parse(raw);
  const counts = new Map<string, AdvisoryScanFinding>();
  for (const result of report.Results ?? []) {
    for (const vuln of result.Vulnerabilities ?? []) {
      const key = `${result.Target}\u0000${vuln.Severity}`;
      const entry = counts.get(key) ?? { target: result.Target, severity: vuln.Severity, count: 0 };
      entry.count++;
      counts.set(key, entry);
    }
  }
  return [...counts.values()];
}

/**
 * Vulnerability scan of a directory or image. Findings are returned, never
 * thrown; only a scanner that cannot run at all raises StageExecutionError.
 */
export class TrivyScanner implements Scanner {
  private readonly trivyBin: string;

  constructor(private readonly opts: TrivyScannerOptions = {}) {
    this.trivyBin = opts.trivyBin ?? 'trivy';
  }

  async scan(req: ScanRequest): Promise<ScanResult> {
    await mkdir(dirname(req.reportPath), { recursive: true });
    const [mode, target] = req.target.kind === 'fs' ? ['fs', req.target.path] : ['image', req.target.ref];
    const args = [
      mode,
      '--severity',
      req.severity,
      '--exit-code',
      String(FINDINGS_EXIT_CODE),
      '--no-progress',
      '--format',
      'json',
      '--output',
      req.reportPath,
      target,
    ];

    const result = await runCommand(this.trivyBin, args, { signal: req.signal, spawn: this.opts.spawn, label: 'trivy' });
    if (result.exitCode !== 0 && result.exitCode !== FINDINGS_EXIT_CODE) {
      throw new StageExecutionError(`${result.command} exited with code ${result.exitCode}: ${stderrTail(result)}`, {
        exitCode: result.exitCode,
      });
    }

    try {
      const findings = summarizeTrivyReport(JSON.parse(await readFile(req.reportPath, 'utf8')));
      return { passed: result.exitCode === 0, findings, reportPath: req.reportPath };
    } catch (err) {
      logger.warn('Scan report could not be read', { report: req.reportPath, error: errorMessage(err) });
      return { passed: result.exitCode === 0, findings: [], reportPath: req.reportPath, reportError: errorMessage(err) };
    }
  }
}
