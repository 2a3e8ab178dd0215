import { execFileSync } from 'node:child_process';
import type { Command } from 'commander';
import { parseCategory } from '../../engine/findings.js';
import { runWorker } from '../../engine/worker.js';
import { commandConfig, required } from '../context.js';

const USAGE = 'run-worker <category> <session-id> [--name <name>] -- <command> [args...]';

export function registerRunWorker(program: Command): void {
  program
    .command('run-worker')
    .description('Run a command and deposit its stdout as one finding')
    .argument('[category]', 'web | fetch | local')
    .argument('[session-id]', 'Session ID')
    .argument('[command...]', 'Command whose stdout becomes the finding')
    .option('--name <name>', 'Worker name recorded in the status log')
    .action(async (categoryArg: string | undefined, sessionIdArg: string | undefined, commandArgs: string[], opts: { name?: string }) => {
      const category = required(categoryArg, USAGE);
      const sessionId = required(sessionIdArg, USAGE);
      const [file, ...args] = commandArgs;
      const executable = required(file, USAGE);
      parseCategory(category);

      const finding = await runWorker(commandConfig(program), {
        sessionId,
        category,
        name: opts.name ?? executable,
        work: () => execFileSync(executable, args, { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'inherit'] }),
      });
      console.log(finding.path);
    });
}
