import type { Command } from 'commander';
import { appendStatus, parsePhase } from '../../engine/status.js';
import { commandConfig, required } from '../context.js';

const USAGE = 'update-status <session-id> <phase> <message>';

export function registerUpdateStatus(program: Command): void {
  program
    .command('update-status')
    .description('Append a phase record to the session log')
    .argument('[session-id]', 'Session ID')
    .argument('[phase]', 'created | planning | executing | synthesizing | complete | error')
    .argument('[message]', 'Status message')
    .action((sessionIdArg?: string, phaseArg?: string, messageArg?: string) => {
      const sessionId = required(sessionIdArg, USAGE);
      const phase = parsePhase(required(phaseArg, USAGE));
      const message = required(messageArg, USAGE);
      const record = appendStatus(commandConfig(program), sessionId, phase, message);
      console.error(`Status: ${record.phase} - ${record.message}`);
    });
}
