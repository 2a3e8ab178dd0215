import type { Command } from 'commander';
import { resolveSession } from '../../engine/session-manager.js';
import { commandConfig, sessionIdOrEnv } from '../context.js';

export function registerGetSessionDir(program: Command): void {
  program
    .command('get-session-dir')
    .description('Print the directory of a session (or "latest")')
    .argument('[session-id]', 'Session ID (defaults to MAILROOM_SESSION_ID env)')
    .action((sessionIdArg?: string) => {
      const sessionId = sessionIdOrEnv(sessionIdArg, 'get-session-dir <session-id>');
      const session = resolveSession(commandConfig(program), sessionId);
      console.log(session.dir);
    });
}
