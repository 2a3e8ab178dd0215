import {
  existsSync,
  lstatSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  readlinkSync,
  renameSync,
  rmSync,
  statSync,
  symlinkSync,
  unlinkSync,
  writeFileSync,
} from 'node:fs';
import { basename } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import type { Config } from '../shared/config.js';
import {
  categoryDir,
  coordinationDir,
  latestAliasPath,
  logPath,
  metaPath,
  outputDir,
  sessionDir,
  sessionDirName,
  type StorageLocation,
} from '../shared/paths.js';
import { CATEGORIES, type SessionHandle, type SessionMeta } from '../shared/types.js';
import { errnoCode, guardWrite, InvalidArgumentError, SessionNotFoundError, storageError } from '../shared/errors.js';
import { formatStamp, isDirectory, tempPathFor } from './fs.js';
import { formatRecord, logHeader } from './log-format.js';

export const LATEST = 'latest';

const META_VERSION = '1.0';
const MAX_ID_ATTEMPTS = 5;
const DAY_MS = 24 * 60 * 60 * 1000;
const SESSION_ID_RE = /^[A-Za-z0-9._-]+$/;

export function generateSessionId(now: Date): string {
  const suffix = uuidv4().replace(/-/g, '').slice(0, 6);
  return `${formatStamp(now)}-${suffix}`;
}

function requiredDirs(loc: StorageLocation, id: string): string[] {
  return [
    ...CATEGORIES.map(category => categoryDir(loc, id, category)),
    coordinationDir(loc, id),
    outputDir(loc, id),
  ];
}

function hasStructure(loc: StorageLocation, id: string): boolean {
  return requiredDirs(loc, id).every(isDirectory);
}

// ---------------------------------------------------------------------------
// latest alias
// ---------------------------------------------------------------------------

function setLatest(loc: StorageLocation, id: string): void {
  const alias = latestAliasPath(loc);
  const tmp = tempPathFor(alias);
  guardWrite(alias, () => {
    symlinkSync(sessionDirName(loc, id), tmp, 'dir');
    renameSync(tmp, alias);
  });
}

function clearLatest(loc: StorageLocation): void {
  try {
    unlinkSync(latestAliasPath(loc));
  } catch (err) {
    if (errnoCode(err) !== 'ENOENT') throw err;
  }
}

/** Session id the alias points at, or null when there is no alias. */
export function readLatest(loc: StorageLocation): string | null {
  const alias = latestAliasPath(loc);
  let target: string;
  try {
    if (!lstatSync(alias).isSymbolicLink()) return null;
    target = readlinkSync(alias);
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return null;
    throw err;
  }
  const name = basename(target);
  const lead = `${loc.prefix}-`;
  return name.startsWith(lead) ? name.slice(lead.length) : null;
}

function clearLatestIf(loc: StorageLocation, ids: Iterable<string>): void {
  const latest = readLatest(loc);
  if (latest === null) return;
  for (const id of ids) {
    if (id === latest) {
      clearLatest(loc);
      return;
    }
  }
}

// ---------------------------------------------------------------------------
// create / resolve / list
// ---------------------------------------------------------------------------

export function createSession(config: Config): SessionHandle {
  guardWrite(config.root, () => mkdirSync(config.root, { recursive: true }));

  let id = '';
  const created = config.now();
  for (let attempt = 1; ; attempt++) {
    id = generateSessionId(created);
    try {
      mkdirSync(sessionDir(config, id));
      break;
    } catch (err) {
      if (errnoCode(err) !== 'EEXIST' || attempt >= MAX_ID_ATTEMPTS) {
        throw storageError(sessionDir(config, id), err);
      }
    }
  }

  const createdAt = created.toISOString();
  const meta: SessionMeta = { sessionId: id, createdAt, version: META_VERSION };

  guardWrite(sessionDir(config, id), () => {
    for (const dir of requiredDirs(config, id)) mkdirSync(dir, { recursive: true });
    writeFileSync(metaPath(config, id), JSON.stringify(meta, null, 2) + '\n', 'utf-8');
    writeFileSync(logPath(config, id), logHeader(id, createdAt) + formatRecord(createdAt, 'created', 'Session created') + '\n', 'utf-8');
  });

  setLatest(config, id);
  return { id, dir: sessionDir(config, id), createdAt };
}

function readCreatedAt(loc: StorageLocation, id: string): string {
  try {
    const meta = JSON.parse(readFileSync(metaPath(loc, id), 'utf-8')) as Partial<SessionMeta>;
    if (typeof meta.createdAt === 'string') return meta.createdAt;
  } catch (err) {
    if (errnoCode(err) !== 'ENOENT') {
      console.error(`[mailroom] Unreadable metadata for session ${id}, using directory time:`, err);
    }
  }
  return statSync(sessionDir(loc, id)).mtime.toISOString();
}

export function resolveSession(loc: StorageLocation, idOrAlias: string): SessionHandle {
  let id = idOrAlias;
  if (idOrAlias === LATEST) {
    const latest = readLatest(loc);
    // A dangling alias is left for the delete paths to clear.
    if (latest === null || !hasStructure(loc, latest)) throw new SessionNotFoundError(LATEST);
    id = latest;
  }

  if (!SESSION_ID_RE.test(id) || id === LATEST || !hasStructure(loc, id)) {
    throw new SessionNotFoundError(idOrAlias);
  }
  return { id, dir: sessionDir(loc, id), createdAt: readCreatedAt(loc, id) };
}

/** Ids of every `<prefix>-*` directory under the root, resolvable or not. */
function sessionDirIds(loc: StorageLocation): string[] {
  if (!existsSync(loc.root)) return [];
  const lead = `${loc.prefix}-`;
  return readdirSync(loc.root, { withFileTypes: true })
    .filter(entry => entry.isDirectory() && entry.name.startsWith(lead))
    .map(entry => entry.name.slice(lead.length))
    .filter(id => id !== LATEST)
    .sort();
}

export function listSessions(loc: StorageLocation): SessionHandle[] {
  const sessions: SessionHandle[] = [];
  for (const id of sessionDirIds(loc)) {
    try {
      sessions.push(resolveSession(loc, id));
    } catch (err) {
      console.error(`[mailroom] Skipping session ${id}:`, err instanceof Error ? err.message : err);
    }
  }
  return sessions;
}

// ---------------------------------------------------------------------------
// delete
// ---------------------------------------------------------------------------

export function deleteSession(loc: StorageLocation, idOrAlias: string): string {
  let id = idOrAlias;
  if (idOrAlias === LATEST) {
    const latest = readLatest(loc);
    if (latest === null) throw new SessionNotFoundError(LATEST);
    id = latest;
  }

  const dir = sessionDir(loc, id);
  if (!SESSION_ID_RE.test(id) || id === LATEST || !isDirectory(dir)) {
    if (idOrAlias === LATEST) clearLatest(loc);
    throw new SessionNotFoundError(idOrAlias);
  }

  guardWrite(dir, () => rmSync(dir, { recursive: true, force: true }));
  clearLatestIf(loc, [id]);
  return id;
}

export function deleteAllSessions(loc: StorageLocation): string[] {
  const removed: string[] = [];
  for (const id of sessionDirIds(loc)) {
    const dir = sessionDir(loc, id);
    guardWrite(dir, () => rmSync(dir, { recursive: true, force: true }));
    removed.push(id);
  }
  clearLatest(loc);
  return removed;
}

export function deleteOlderThan(config: Config, days: number): string[] {
  if (!Number.isFinite(days) || days < 0) {
    throw new InvalidArgumentError(`--older-than expects a non-negative number of days, got ${days}`);
  }
  const cutoff = config.now().getTime() - days * DAY_MS;

  const removed: string[] = [];
  for (const id of sessionDirIds(config)) {
    const dir = sessionDir(config, id);
    if (statSync(dir).mtime.getTime() >= cutoff) continue;
    guardWrite(dir, () => rmSync(dir, { recursive: true, force: true }));
    removed.push(id);
  }
  clearLatestIf(config, removed);
  return removed;
}
