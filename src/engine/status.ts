import { readFileSync } from 'node:fs';
import type { Config } from '../shared/config.js';
import { logPath, type StorageLocation } from '../shared/paths.js';
import { PHASES, type Phase, type StatusRecord } from '../shared/types.js';
import { InvalidPhaseError } from '../shared/errors.js';
import { appendLine } from './fs.js';
import { foldMessage, formatRecord, isPhase, parseLog } from './log-format.js';
import { resolveSession } from './session-manager.js';

export function parsePhase(value: string): Phase {
  if (!isPhase(value)) throw new InvalidPhaseError(value, PHASES);
  return value;
}

/**
 * Appends one record to the session's coordination log. Any phase may follow
 * any other; ordering is left to the coordinator.
 */
export function appendStatus(config: Config, sessionId: string, phase: Phase, message: string): StatusRecord {
  const session = resolveSession(config, sessionId);
  const timestamp = config.now().toISOString();
  appendLine(logPath(config, session.id), formatRecord(timestamp, phase, message));
  return { sessionId: session.id, phase, message: foldMessage(message), timestamp };
}

export function statusHistory(loc: StorageLocation, sessionId: string): StatusRecord[] {
  const session = resolveSession(loc, sessionId);
  return parseLog(session.id, readFileSync(logPath(loc, session.id), 'utf-8'));
}

/** Record with the latest timestamp; on a tie the one appended last wins. */
export function currentStatus(loc: StorageLocation, sessionId: string): StatusRecord | null {
  let current: StatusRecord | null = null;
  let currentTime = -Infinity;
  for (const record of statusHistory(loc, sessionId)) {
    const time = Date.parse(record.timestamp);
    if (time >= currentTime) {
      current = record;
      currentTime = time;
    }
  }
  return current;
}
