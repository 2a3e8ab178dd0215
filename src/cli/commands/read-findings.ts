import type { Command } from 'commander';
import { listFindings, parseCategoryFilter } from '../../engine/findings.js';
import { commandConfig, required } from '../context.js';

export function registerReadFindings(program: Command): void {
  program
    .command('read-findings')
    .description('List finding paths of a session, or "none"')
    .argument('[session-id]', 'Session ID')
    .argument('[category]', 'web | fetch | local | all', 'all')
    .action((sessionIdArg: string | undefined, categoryArg: string) => {
      const sessionId = required(sessionIdArg, 'read-findings <session-id> [web|fetch|local|all]');
      const filter = parseCategoryFilter(categoryArg);
      const paths = listFindings(commandConfig(program), sessionId, filter);
      if (paths === null) {
        console.log('none');
        return;
      }
      for (const path of paths) console.log(path);
    });
}
