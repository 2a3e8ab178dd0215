import type { Command } from 'commander';
import { currentStatus, statusHistory } from '../../engine/status.js';
import { commandConfig, sessionIdOrEnv } from '../context.js';
import { formatRecordLine } from '../format.js';

export function registerStatus(program: Command): void {
  program
    .command('current-status')
    .description('Show the most recent status record of a session')
    .argument('[session-id]', 'Session ID (defaults to MAILROOM_SESSION_ID env)')
    .option('--json', 'Print the record as JSON')
    .action((sessionIdArg: string | undefined, opts: { json?: boolean }) => {
      const sessionId = sessionIdOrEnv(sessionIdArg, 'current-status <session-id>');
      const record = currentStatus(commandConfig(program), sessionId);
      if (opts.json) {
        console.log(JSON.stringify(record));
        return;
      }
      if (!record) {
        console.log('none');
        return;
      }
      console.log(`Phase: ${record.phase}`);
      console.log(`Message: ${record.message}`);
      console.log(`Updated: ${record.timestamp}`);
    });

  program
    .command('status-history')
    .description('Show every status record of a session in write order')
    .argument('[session-id]', 'Session ID (defaults to MAILROOM_SESSION_ID env)')
    .option('--json', 'Print the records as a JSON array')
    .action((sessionIdArg: string | undefined, opts: { json?: boolean }) => {
      const sessionId = sessionIdOrEnv(sessionIdArg, 'status-history <session-id>');
      const records = statusHistory(commandConfig(program), sessionId);
      if (opts.json) {
        console.log(JSON.stringify(records, null, 2));
        return;
      }
      for (const record of records) console.log(formatRecordLine(record));
    });
}
