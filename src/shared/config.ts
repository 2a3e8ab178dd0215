import { resolve } from 'node:path';
import { defaultRoot, type StorageLocation } from './paths.js';
import { InvalidConfigError } from './errors.js';

export type HashMode = 'full' | 'prefix';

export type CollisionPolicy = 'error' | 'overwrite';

export interface Config extends StorageLocation {
  hashMode: HashMode;
  hashPrefixBytes: number;
  onCollision: CollisionPolicy;
  pollIntervalMs: number;
  now: () => Date;
}

const DEFAULT_CONFIG: Omit<Config, 'root'> = {
  prefix: 'mailroom',
  hashMode: 'full',
  hashPrefixBytes: 100,
  onCollision: 'error',
  pollIntervalMs: 1000,
  now: () => new Date(),
};

function oneOf<T extends string>(key: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find(a => a === value);
  if (match === undefined) throw new InvalidConfigError(key, value, allowed.join(' | '));
  return match;
}

function positiveInt(key: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidConfigError(key, value, 'a positive integer');
  return n;
}

function prefixName(key: string, value: string): string {
  if (!/^[A-Za-z0-9._]+$/.test(value)) throw new InvalidConfigError(key, value, 'letters, digits, "." or "_"');
  return value;
}

function readEnv(env: NodeJS.ProcessEnv): Partial<Config> {
  const fromEnv: Partial<Config> = {};
  if (env.MAILROOM_ROOT) fromEnv.root = env.MAILROOM_ROOT;
  if (env.MAILROOM_PREFIX) fromEnv.prefix = prefixName('MAILROOM_PREFIX', env.MAILROOM_PREFIX);
  if (env.MAILROOM_HASH_MODE) {
    fromEnv.hashMode = oneOf('MAILROOM_HASH_MODE', env.MAILROOM_HASH_MODE, ['full', 'prefix'] as const);
  }
  if (env.MAILROOM_ON_COLLISION) {
    fromEnv.onCollision = oneOf('MAILROOM_ON_COLLISION', env.MAILROOM_ON_COLLISION, ['error', 'overwrite'] as const);
  }
  if (env.MAILROOM_POLL_INTERVAL_MS) {
    fromEnv.pollIntervalMs = positiveInt('MAILROOM_POLL_INTERVAL_MS', env.MAILROOM_POLL_INTERVAL_MS);
  }
  return fromEnv;
}

export function loadConfig(cwd: string, overrides: Partial<Config> = {}, env: NodeJS.ProcessEnv = process.env): Config {
  if (overrides.prefix !== undefined) prefixName('prefix', overrides.prefix);
  const merged: Config = { ...DEFAULT_CONFIG, root: defaultRoot(cwd), ...readEnv(env), ...overrides };
  return { ...merged, root: resolve(cwd, merged.root) };
}
