import type { Phase, StatusRecord } from '../shared/types.js';

const PHASE_COLORS: Record<Phase, string> = {
  created: '\x1b[90m',      // gray
  planning: '\x1b[34m',     // blue
  executing: '\x1b[33m',    // yellow
  synthesizing: '\x1b[35m', // magenta
  complete: '\x1b[32m',     // green
  error: '\x1b[31m',        // red
};
const RESET = '\x1b[0m';
export const BOLD = '\x1b[1m';
export const DIM = '\x1b[2m';

export function useColor(): boolean {
  return process.stdout.isTTY === true && !process.env.NO_COLOR;
}

export function style(text: string, code: string): string {
  return useColor() ? `${code}${text}${RESET}` : text;
}

export function colorizePhase(phase: Phase): string {
  return style(phase, PHASE_COLORS[phase]);
}

export function formatRecordLine(record: StatusRecord): string {
  return `${record.timestamp}  ${colorizePhase(record.phase)}  ${record.message}`;
}
