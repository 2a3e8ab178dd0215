import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, readFileSync, rmSync, utimesSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createProgram } from '../cli/program.js';
import { sessionDir } from '../shared/paths.js';
import { InvalidCategoryError, MissingArgumentError, SessionNotFoundError, WaitTimeoutError } from '../shared/errors.js';

const DAY_MS = 24 * 60 * 60 * 1000;

let testDir: string;
let root: string;
let stdout: string[];

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), 'mailroom-cli-'));
  root = join(testDir, 'store');
  stdout = [];
  mock.method(console, 'log', (...args: unknown[]) => { stdout.push(args.map(String).join(' ')); });
  mock.method(console, 'error', () => {});
});

afterEach(() => {
  mock.restoreAll();
  rmSync(testDir, { recursive: true, force: true });
});

async function run(...args: string[]): Promise<string[]> {
  stdout = [];
  await createProgram().parseAsync(['node', 'mailroom', '--root', root, ...args]);
  return stdout;
}

async function newSession(): Promise<string> {
  const [id] = await run('create-session');
  assert.ok(id);
  return id;
}

function contentFile(name: string, content: string): string {
  const path = join(testDir, name);
  writeFileSync(path, content, 'utf-8');
  return path;
}

describe('create-session / get-session-dir', () => {
  it('prints only the new id on stdout', async () => {
    const out = await run('create-session');
    assert.equal(out.length, 1);
    assert.match(out[0]!, /^\d{8}-\d{6}-[0-9a-f]{6}$/);
  });

  it('prints the directory of a session and of the latest alias', async () => {
    const id = await newSession();
    const expected = sessionDir({ root, prefix: 'mailroom' }, id);
    assert.deepStrictEqual(await run('get-session-dir', id), [expected]);
    assert.deepStrictEqual(await run('get-session-dir', 'latest'), [expected]);
  });
});

describe('write-finding / read-findings', () => {
  it('writes a finding and lists it by category', async () => {
    const id = await newSession();
    const [written] = await run('write-finding', 'web', id, contentFile('a.md', 'A'));
    assert.ok(written);

    assert.deepStrictEqual(await run('read-findings', id, 'web'), [written]);
    assert.equal(readFileSync(written, 'utf-8'), 'A');
  });

  it('lists one path per category for "all"', async () => {
    const id = await newSession();
    const [web] = await run('write-finding', 'web', id, contentFile('a.md', 'A'));
    const [fetch] = await run('write-finding', 'fetch', id, contentFile('b.md', 'B'));
    const [local] = await run('write-finding', 'local', id, contentFile('c.md', 'C'));

    assert.deepStrictEqual(await run('read-findings', id, 'all'), [web, fetch, local]);
    assert.deepStrictEqual(await run('read-findings', id), [web, fetch, local]);
  });

  it('prints "none" for an empty category', async () => {
    const id = await newSession();
    assert.deepStrictEqual(await run('read-findings', id, 'local'), ['none']);
  });

  it('fails on missing arguments', async () => {
    await assert.rejects(
      () => run('write-finding', 'web'),
      (err: unknown) => err instanceof MissingArgumentError
        && err.message === 'Missing required arguments. Usage: write-finding <category> <session-id> <content-path>',
    );
    await assert.rejects(() => run('read-findings'), MissingArgumentError);
  });

  it('fails on an invalid category instead of defaulting', async () => {
    const id = await newSession();
    await assert.rejects(() => run('write-finding', 'news', id, contentFile('a.md', 'A')), InvalidCategoryError);
    await assert.rejects(() => run('read-findings', id, 'news'), InvalidCategoryError);
  });
});

describe('update-status / current-status', () => {
  it('reports the most recent phase and message', async () => {
    const id = await newSession();
    await run('update-status', id, 'executing', 'worker 2 done');

    const out = await run('current-status', id);
    assert.equal(out[0], 'Phase: executing');
    assert.equal(out[1], 'Message: worker 2 done');
  });

  it('prints the record as JSON on request', async () => {
    const id = await newSession();
    await run('update-status', id, 'planning', 'splitting work');

    const [json] = await run('current-status', id, '--json');
    const record = JSON.parse(json ?? 'null');
    assert.equal(record.sessionId, id);
    assert.equal(record.phase, 'planning');
    assert.equal(record.message, 'splitting work');
  });

  it('lists the full history', async () => {
    const id = await newSession();
    await run('update-status', id, 'planning', 'plan');
    const [json] = await run('status-history', id, '--json');
    const phases = (JSON.parse(json ?? '[]') as Array<{ phase: string }>).map(r => r.phase);
    assert.deepStrictEqual(phases, ['created', 'planning']);
  });
});

describe('synthesize', () => {
  it('prints the output path', async () => {
    const id = await newSession();
    await run('write-finding', 'web', id, contentFile('a.md', 'A'));

    const [path] = await run('synthesize', id);
    assert.equal(path, join(sessionDir({ root, prefix: 'mailroom' }, id), 'output', 'final-response.md'));
  });
});

describe('run-worker', () => {
  it('deposits the command output as one finding', async () => {
    const id = await newSession();
    const [path] = await run('run-worker', 'web', id, '--', process.execPath, '-e', "process.stdout.write('x')");
    assert.ok(path);

    assert.deepStrictEqual(await run('read-findings', id, 'web'), [path]);
    assert.equal(readFileSync(path, 'utf-8'), 'x');
  });

  it('writes nothing when the command fails', async () => {
    const id = await newSession();
    await assert.rejects(() => run('run-worker', 'web', id, '--', process.execPath, '-e', 'process.exit(3)'));
    assert.deepStrictEqual(await run('read-findings', id), ['none']);
  });
});

describe('wait-findings', () => {
  it('prints the paths once enough findings exist', async () => {
    const id = await newSession();
    const [written] = await run('write-finding', 'fetch', id, contentFile('a.md', 'A'));
    assert.deepStrictEqual(await run('wait-findings', id, '--count', '1', '--timeout', '1', '--interval', '10'), [written]);
  });

  it('times out in seconds', async () => {
    const id = await newSession();
    await assert.rejects(
      () => run('wait-findings', id, '--count', '1', '--timeout', '0.05', '--interval', '10'),
      (err: unknown) => err instanceof WaitTimeoutError
        && err.message === `Timed out after 50ms waiting for 1 finding(s) in session ${id} (found 0)`,
    );
  });
});

describe('list-sessions', () => {
  it('reports finding counts and the latest session as JSON', async () => {
    const first = await newSession();
    await run('write-finding', 'web', first, contentFile('a.md', 'A'));
    const second = await newSession();

    const [json] = await run('list-sessions', '--json');
    const sessions = JSON.parse(json ?? '[]') as Array<{ id: string; findingCount: number; latest: boolean }>;
    const byId = new Map(sessions.map(s => [s.id, s]));

    assert.equal(sessions.length, 2);
    assert.equal(byId.get(first)?.findingCount, 1);
    assert.equal(byId.get(first)?.latest, false);
    assert.equal(byId.get(second)?.findingCount, 0);
    assert.equal(byId.get(second)?.latest, true);
  });
});

describe('cleanup-session', () => {
  it('removes a session once, then reports it missing', async () => {
    const id = await newSession();
    assert.deepStrictEqual(await run('cleanup-session', id), [`Session removed: ${id}`]);
    await assert.rejects(
      () => run('cleanup-session', id),
      (err: unknown) => err instanceof SessionNotFoundError && err.message === `Session not found: ${id}`,
    );
  });

  it('removes everything with --all', async () => {
    await newSession();
    await newSession();
    assert.deepStrictEqual(await run('cleanup-session', '--all'), ['All sessions removed (2)']);
    assert.deepStrictEqual(await run('list-sessions'), ['No sessions']);
  });

  it('removes only sessions past the --older-than threshold', async () => {
    const old = await newSession();
    const recent = await newSession();
    const now = Date.now();
    const tenDaysAgo = new Date(now - 10 * DAY_MS);
    const oneDayAgo = new Date(now - DAY_MS);
    utimesSync(sessionDir({ root, prefix: 'mailroom' }, old), tenDaysAgo, tenDaysAgo);
    utimesSync(sessionDir({ root, prefix: 'mailroom' }, recent), oneDayAgo, oneDayAgo);

    assert.deepStrictEqual(await run('cleanup-session', '--older-than', '7'), [
      `Removed session: ${old}`,
      'Old sessions removed (1)',
    ]);
    assert.deepStrictEqual(await run('get-session-dir', recent), [sessionDir({ root, prefix: 'mailroom' }, recent)]);
  });

  it('requires a target', async () => {
    await assert.rejects(() => run('cleanup-session'), MissingArgumentError);
  });
});
