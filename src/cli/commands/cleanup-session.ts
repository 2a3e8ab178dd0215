import type { Command } from 'commander';
import { deleteAllSessions, deleteOlderThan, deleteSession } from '../../engine/session-manager.js';
import { InvalidArgumentError, MissingArgumentError } from '../../shared/errors.js';
import { commandConfig } from '../context.js';

const USAGE = 'cleanup-session <session-id> | --all | --older-than <days>';

export function registerCleanupSession(program: Command): void {
  program
    .command('cleanup-session')
    .description('Delete one session, every session, or sessions older than N days')
    .argument('[session-id]', 'Session ID (or "latest")')
    .option('--all', 'Remove every session')
    .option('--older-than <days>', 'Remove sessions last modified more than <days> days ago')
    .action((sessionId: string | undefined, opts: { all?: boolean; olderThan?: string }) => {
      const modes = [sessionId !== undefined, opts.all === true, opts.olderThan !== undefined].filter(Boolean).length;
      if (modes === 0) throw new MissingArgumentError(USAGE);
      if (modes > 1) throw new InvalidArgumentError(`Choose exactly one of: ${USAGE}`);

      const config = commandConfig(program);

      if (opts.all) {
        console.error('Removing all sessions...');
        const removed = deleteAllSessions(config);
        console.log(`All sessions removed (${removed.length})`);
        return;
      }

      if (opts.olderThan !== undefined) {
        const days = Number(opts.olderThan);
        if (opts.olderThan.trim() === '' || Number.isNaN(days)) {
          throw new InvalidArgumentError(`--older-than expects a number of days, got "${opts.olderThan}"`);
        }
        console.error(`Removing sessions older than ${days} days...`);
        const removed = deleteOlderThan(config, days);
        for (const id of removed) console.log(`Removed session: ${id}`);
        console.log(`Old sessions removed (${removed.length})`);
        return;
      }

      if (sessionId !== undefined) {
        const removed = deleteSession(config, sessionId);
        console.log(`Session removed: ${removed}`);
      }
    });
}
