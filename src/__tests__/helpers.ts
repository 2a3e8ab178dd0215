import { join } from 'node:path';
import { loadConfig, type Config } from '../shared/config.js';

// 2026-10-19 14:30:52 local time; finding stamps read 20261019-143052.
export const FIXED_NOW = new Date(2026, 9, 19, 14, 30, 52);
export const FIXED_STAMP = '20261019-143052';

export function testConfig(testDir: string, overrides: Partial<Config> = {}): Config {
  return loadConfig(testDir, { root: join(testDir, 'store'), now: () => FIXED_NOW, ...overrides }, {});
}
