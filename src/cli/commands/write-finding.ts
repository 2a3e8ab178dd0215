import { readFileSync } from 'node:fs';
import type { Command } from 'commander';
import { parseCategory, writeFinding } from '../../engine/findings.js';
import { errnoCode, InvalidArgumentError, MissingArgumentError } from '../../shared/errors.js';
import { commandConfig, required } from '../context.js';
import { readStdin } from '../stdin.js';

const USAGE = 'write-finding <category> <session-id> <content-path>';

async function readContent(contentPath: string): Promise<string> {
  if (contentPath === '-') {
    const content = await readStdin();
    if (content === null) throw new MissingArgumentError(`${USAGE} (pipe content via stdin when using "-")`);
    return content;
  }
  try {
    return readFileSync(contentPath, 'utf-8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') throw new InvalidArgumentError(`Content file not found: ${contentPath}`);
    throw err;
  }
}

export function registerWriteFinding(program: Command): void {
  program
    .command('write-finding')
    .description('Deposit one finding into a session and print its path')
    .argument('[category]', 'web | fetch | local')
    .argument('[session-id]', 'Session ID')
    .argument('[content-path]', 'File holding the finding, or "-" for stdin')
    .action(async (categoryArg?: string, sessionIdArg?: string, contentPathArg?: string) => {
      const category = required(categoryArg, USAGE);
      const sessionId = required(sessionIdArg, USAGE);
      const contentPath = required(contentPathArg, USAGE);
      parseCategory(category);

      const config = commandConfig(program);
      const content = await readContent(contentPath);
      const finding = writeFinding(config, sessionId, category, content);
      console.log(finding.path);
    });
}
