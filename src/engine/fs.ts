import { appendFileSync, renameSync, writeFileSync, statSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { guardWrite } from '../shared/errors.js';

/** Hidden sibling of `filePath`; never matches a `*.md` listing. */
export function tempPathFor(filePath: string): string {
  return join(dirname(filePath), `.${basename(filePath)}.${uuidv4()}.tmp`);
}

export function atomicWrite(filePath: string, data: string): void {
  const tmpPath = tempPathFor(filePath);
  guardWrite(filePath, () => {
    writeFileSync(tmpPath, data, 'utf-8');
    renameSync(tmpPath, filePath);
  });
}

// appendFileSync opens with O_APPEND and closes per call, so concurrent
// appenders never interleave within a line.
export function appendLine(filePath: string, line: string): void {
  guardWrite(filePath, () => appendFileSync(filePath, `${line}\n`, 'utf-8'));
}

export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local wall-clock stamp in `YYYYMMDD-HHMMSS` form. */
export function formatStamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}-${time}`;
}
