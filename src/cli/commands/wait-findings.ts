import type { Command } from 'commander';
import { parseCategoryFilter } from '../../engine/findings.js';
import { waitForFindings } from '../../engine/worker.js';
import { InvalidArgumentError } from '../../shared/errors.js';
import { commandConfig, required } from '../context.js';

function parseNumber(flag: string, value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n < 0) {
    throw new InvalidArgumentError(`${flag} expects a non-negative number, got "${value}"`);
  }
  return n;
}

export function registerWaitFindings(program: Command): void {
  program
    .command('wait-findings')
    .description('Block until a session holds at least <count> findings')
    .argument('[session-id]', 'Session ID')
    .requiredOption('--count <n>', 'Number of findings to wait for')
    .option('--category <category>', 'web | fetch | local | all', 'all')
    .option('--timeout <seconds>', 'Give up after this many seconds')
    .option('--interval <ms>', 'Polling interval in milliseconds')
    .action(async (sessionIdArg: string | undefined, opts: { count: string; category: string; timeout?: string; interval?: string }) => {
      const sessionId = required(sessionIdArg, 'wait-findings <session-id> --count <n>');
      const config = commandConfig(program);
      const paths = await waitForFindings(config, sessionId, {
        expected: parseNumber('--count', opts.count),
        category: parseCategoryFilter(opts.category),
        timeoutMs: opts.timeout !== undefined ? parseNumber('--timeout', opts.timeout) * 1000 : undefined,
        pollIntervalMs: opts.interval !== undefined ? parseNumber('--interval', opts.interval) : undefined,
      });
      for (const path of paths) console.log(path);
    });
}
