import type { Command } from 'commander';
import { synthesize } from '../../engine/aggregator.js';
import { commandConfig, sessionIdOrEnv } from '../context.js';

export function registerSynthesize(program: Command): void {
  program
    .command('synthesize')
    .description('Combine all findings of a session into output/final-response.md')
    .argument('[session-id]', 'Session ID (defaults to MAILROOM_SESSION_ID env)')
    .action((sessionIdArg?: string) => {
      const sessionId = sessionIdOrEnv(sessionIdArg, 'synthesize <session-id>');
      const output = synthesize(commandConfig(program), sessionId);
      console.error(`Synthesized ${output.findingCount} finding(s)`);
      console.log(output.path);
    });
}
