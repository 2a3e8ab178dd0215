import { createHash } from 'node:crypto';
import { linkSync, readdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { Config, HashMode } from '../shared/config.js';
import { categoryDir, type StorageLocation } from '../shared/paths.js';
import { CATEGORIES, type Category, type CategoryFilter, type Finding } from '../shared/types.js';
import { errnoCode, FindingCollisionError, guardWrite, InvalidCategoryError } from '../shared/errors.js';
import { formatStamp, tempPathFor } from './fs.js';
import { resolveSession } from './session-manager.js';
import { appendStatus } from './status.js';

// Descriptive names used by callers that think in terms of provenance.
const CATEGORY_ALIASES = new Map<string, Category>([
  ['remote-search', 'web'],
  ['remote-fetch', 'fetch'],
  ['local-search', 'local'],
]);

export const CATEGORY_LABELS: Record<Category, string> = {
  web: 'Web Search',
  fetch: 'Fetched Pages',
  local: 'Local Search',
};

export function parseCategory(value: string): Category {
  const match = CATEGORIES.find(c => c === value) ?? CATEGORY_ALIASES.get(value);
  if (match === undefined) throw new InvalidCategoryError(value);
  return match;
}

export function parseCategoryFilter(value: string): CategoryFilter {
  return value === 'all' ? 'all' : parseCategory(value);
}

export function contentHash(content: string, mode: HashMode, prefixBytes: number): string {
  const bytes = Buffer.from(content, 'utf-8');
  const input = mode === 'prefix' ? bytes.subarray(0, prefixBytes) : bytes;
  return createHash('md5').update(input).digest('hex').slice(0, 8);
}

export function findingFilename(now: Date, content: string, mode: HashMode, prefixBytes: number): string {
  return `${formatStamp(now)}-${contentHash(content, mode, prefixBytes)}.md`;
}

function placeFile(tmpPath: string, finalPath: string, onCollision: Config['onCollision']): void {
  try {
    if (onCollision === 'overwrite') {
      renameSync(tmpPath, finalPath);
      return;
    }
    // link() refuses to replace an existing name, which makes the check atomic.
    linkSync(tmpPath, finalPath);
  } catch (err) {
    if (errnoCode(err) === 'EEXIST') throw new FindingCollisionError(finalPath);
    throw err;
  } finally {
    // already gone after a successful rename
    rmSync(tmpPath, { force: true });
  }
}

export function writeFinding(config: Config, sessionId: string, category: string, content: string): Finding {
  const cat = parseCategory(category);
  const session = resolveSession(config, sessionId);

  const filename = findingFilename(config.now(), content, config.hashMode, config.hashPrefixBytes);
  const finalPath = join(categoryDir(config, session.id, cat), filename);
  const tmpPath = tempPathFor(finalPath);

  guardWrite(finalPath, () => {
    writeFileSync(tmpPath, content, 'utf-8');
    placeFile(tmpPath, finalPath, config.onCollision);
  });

  appendStatus(config, session.id, 'executing', `Finding written: ${cat}/${filename}`);
  return { sessionId: session.id, category: cat, filename, path: finalPath, content };
}

function categoriesFor(filter: CategoryFilter): readonly Category[] {
  return filter === 'all' ? CATEGORIES : [parseCategory(filter)];
}

function findingNames(loc: StorageLocation, sessionId: string, category: Category): string[] {
  return readdirSync(categoryDir(loc, sessionId, category))
    .filter(name => name.endsWith('.md') && !name.startsWith('.'))
    .sort();
}

/**
 * Paths of every finding in the requested categories, ordered by category then
 * filename. Returns null when there are none.
 */
export function listFindings(loc: StorageLocation, sessionId: string, filter: CategoryFilter): string[] | null {
  const session = resolveSession(loc, sessionId);
  const paths: string[] = [];
  for (const category of categoriesFor(filter)) {
    for (const name of findingNames(loc, session.id, category)) {
      paths.push(join(categoryDir(loc, session.id, category), name));
    }
  }
  return paths.length > 0 ? paths : null;
}

export function readFindings(loc: StorageLocation, sessionId: string, filter: CategoryFilter): Finding[] {
  const session = resolveSession(loc, sessionId);
  const findings: Finding[] = [];
  for (const category of categoriesFor(filter)) {
    for (const filename of findingNames(loc, session.id, category)) {
      const path = join(categoryDir(loc, session.id, category), filename);
      findings.push({ sessionId: session.id, category, filename, path, content: readFileSync(path, 'utf-8') });
    }
  }
  return findings;
}
