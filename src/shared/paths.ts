import { join } from 'node:path';
import type { Category } from './types.js';

export interface StorageLocation {
  root: string;
  prefix: string;
}

export function defaultRoot(cwd: string): string {
  return join(cwd, '.mailroom', 'tmp');
}

export function sessionDirName(loc: StorageLocation, sessionId: string): string {
  return `${loc.prefix}-${sessionId}`;
}

export function sessionDir(loc: StorageLocation, sessionId: string): string {
  return join(loc.root, sessionDirName(loc, sessionId));
}

export function latestAliasPath(loc: StorageLocation): string {
  return join(loc.root, `${loc.prefix}-latest`);
}

export function findingsDir(loc: StorageLocation, sessionId: string): string {
  return join(sessionDir(loc, sessionId), 'findings');
}

export function categoryDir(loc: StorageLocation, sessionId: string, category: Category): string {
  return join(findingsDir(loc, sessionId), category);
}

export function coordinationDir(loc: StorageLocation, sessionId: string): string {
  return join(sessionDir(loc, sessionId), 'coordination');
}

export function logPath(loc: StorageLocation, sessionId: string): string {
  return join(coordinationDir(loc, sessionId), 'log.md');
}

export function metaPath(loc: StorageLocation, sessionId: string): string {
  return join(coordinationDir(loc, sessionId), 'meta.json');
}

export function outputDir(loc: StorageLocation, sessionId: string): string {
  return join(sessionDir(loc, sessionId), 'output');
}

export function finalResponsePath(loc: StorageLocation, sessionId: string): string {
  return join(outputDir(loc, sessionId), 'final-response.md');
}
