import { CommanderError } from 'commander';
import { createProgram } from './program.js';

createProgram().parseAsync(process.argv).catch((err: unknown) => {
  // commander has already printed its own diagnostic (or help/version)
  if (err instanceof CommanderError) process.exit(err.exitCode);
  console.error(`ERROR: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
