import { setTimeout as sleep } from 'node:timers/promises';
import type { Config } from '../shared/config.js';
import type { CategoryFilter, Finding } from '../shared/types.js';
import { InvalidArgumentError, WaitTimeoutError } from '../shared/errors.js';
import { listFindings, parseCategory, writeFinding } from './findings.js';
import { resolveSession } from './session-manager.js';
import { appendStatus } from './status.js';

export interface WorkerSpec {
  sessionId: string;
  category: string;
  name: string;
  work: () => string | Promise<string>;
}

/**
 * One unit of fan-out work: resolve the session, produce a single blob, deposit
 * it, note completion. Never looks at sibling findings.
 */
export async function runWorker(config: Config, spec: WorkerSpec): Promise<Finding> {
  const category = parseCategory(spec.category);
  const session = resolveSession(config, spec.sessionId);

  const content = await spec.work();
  const finding = writeFinding(config, session.id, category, content);
  appendStatus(config, session.id, 'executing', `Worker ${spec.name} completed: ${category}/${finding.filename}`);
  return finding;
}

export interface WaitOptions {
  expected: number;
  category?: CategoryFilter;
  timeoutMs?: number;
  pollIntervalMs?: number;
}

/** Polls until at least `expected` findings exist, returning their paths. */
export async function waitForFindings(config: Config, sessionId: string, opts: WaitOptions): Promise<string[]> {
  if (!Number.isInteger(opts.expected) || opts.expected < 1) {
    throw new InvalidArgumentError(`Expected finding count must be a positive integer, got ${opts.expected}`);
  }
  const filter = opts.category ?? 'all';
  const interval = opts.pollIntervalMs ?? config.pollIntervalMs;
  const deadline = opts.timeoutMs !== undefined ? Date.now() + opts.timeoutMs : Infinity;

  for (;;) {
    const paths = listFindings(config, sessionId, filter) ?? [];
    if (paths.length >= opts.expected) return paths;
    if (Date.now() >= deadline) {
      throw new WaitTimeoutError(sessionId, opts.expected, paths.length, opts.timeoutMs ?? 0);
    }
    await sleep(Math.max(0, Math.min(interval, deadline - Date.now())));
  }
}
