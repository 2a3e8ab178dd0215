import { Command } from 'commander';
import { registerCreateSession } from './commands/create-session.js';
import { registerGetSessionDir } from './commands/get-session-dir.js';
import { registerWriteFinding } from './commands/write-finding.js';
import { registerReadFindings } from './commands/read-findings.js';
import { registerUpdateStatus } from './commands/update-status.js';
import { registerStatus } from './commands/status.js';
import { registerListSessions } from './commands/list-sessions.js';
import { registerSynthesize } from './commands/synthesize.js';
import { registerWaitFindings } from './commands/wait-findings.js';
import { registerRunWorker } from './commands/run-worker.js';
import { registerCleanupSession } from './commands/cleanup-session.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('mailroom')
    .description('Filesystem mailbox for fanning work out to independent workers and collecting their findings')
    .version('0.1.0')
    .option('--root <dir>', 'Storage root (defaults to MAILROOM_ROOT or .mailroom/tmp)')
    .option('--prefix <name>', 'Session directory prefix (defaults to MAILROOM_PREFIX or "mailroom")')
    .exitOverride()
    .configureOutput({
      outputError: (str, write) => write(`ERROR: ${str.replace(/^error:\s*/i, '')}`),
    });

  registerCreateSession(program);
  registerGetSessionDir(program);
  registerWriteFinding(program);
  registerReadFindings(program);
  registerUpdateStatus(program);
  registerStatus(program);
  registerListSessions(program);
  registerSynthesize(program);
  registerWaitFindings(program);
  registerRunWorker(program);
  registerCleanupSession(program);

  return program;
}
