import type { Command } from 'commander';
import { loadConfig, type Config } from '../shared/config.js';
import { MissingArgumentError } from '../shared/errors.js';

export type GlobalOptions = {
  root?: string;
  prefix?: string;
};

export function commandConfig(program: Command): Config {
  const opts = program.opts<GlobalOptions>();
  const overrides: Partial<Config> = {};
  if (opts.root) overrides.root = opts.root;
  if (opts.prefix) overrides.prefix = opts.prefix;
  return loadConfig(process.cwd(), overrides);
}

/** Positional id, falling back to MAILROOM_SESSION_ID for agents spawned with it set. */
export function sessionIdOrEnv(arg: string | undefined, usage: string): string {
  const sessionId = arg ?? process.env.MAILROOM_SESSION_ID;
  if (!sessionId) throw new MissingArgumentError(usage);
  return sessionId;
}

export function required(value: string | undefined, usage: string): string {
  if (value === undefined || value === '') throw new MissingArgumentError(usage);
  return value;
}
