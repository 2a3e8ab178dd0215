import type { Command } from 'commander';
import { createSession } from '../../engine/session-manager.js';
import { latestAliasPath } from '../../shared/paths.js';
import { commandConfig } from '../context.js';

export function registerCreateSession(program: Command): void {
  program
    .command('create-session')
    .description('Create a new session and print its id')
    .action(() => {
      const config = commandConfig(program);
      const session = createSession(config);
      console.error(`Session created: ${session.id}`);
      console.error(`Directory: ${session.dir}`);
      console.error(`Latest: ${latestAliasPath(config)}`);
      console.log(session.id);
    });
}
