import { PHASES, type Phase, type StatusRecord } from '../shared/types.js';

// <ISO timestamp> - Status: <phase> - <message>
const RECORD_RE = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?Z) - Status: ([a-z]+) - (.*)$/;

export function isPhase(value: string): value is Phase {
  return PHASES.some(p => p === value);
}

export function foldMessage(message: string): string {
  return message.replace(/\s*\r?\n\s*/g, ' ').trim();
}

export function formatRecord(timestamp: string, phase: Phase, message: string): string {
  return `${timestamp} - Status: ${phase} - ${foldMessage(message)}`;
}

export function parseRecord(sessionId: string, line: string): StatusRecord | null {
  const match = RECORD_RE.exec(line);
  if (!match) return null;
  const [, timestamp, phase, message] = match;
  if (timestamp === undefined || phase === undefined || message === undefined || !isPhase(phase)) return null;
  return { sessionId, timestamp, phase, message };
}

export function parseLog(sessionId: string, content: string): StatusRecord[] {
  const records: StatusRecord[] = [];
  for (const line of content.split('\n')) {
    const record = parseRecord(sessionId, line);
    if (record) records.push(record);
  }
  return records;
}

export function logHeader(sessionId: string, createdAt: string): string {
  return [
    '# Session Log',
    '',
    `Session ID: ${sessionId}`,
    `Created: ${createdAt}`,
    '',
    '---',
    '',
    '',
  ].join('\n');
}
