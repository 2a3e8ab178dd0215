import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { renderSynthesis, synthesize } from '../engine/aggregator.js';
import { writeFinding } from '../engine/findings.js';
import { createSession } from '../engine/session-manager.js';
import { currentStatus, statusHistory } from '../engine/status.js';
import { SessionNotFoundError } from '../shared/errors.js';
import { finalResponsePath } from '../shared/paths.js';
import type { Finding } from '../shared/types.js';
import { testConfig } from './helpers.js';

let testDir: string;

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), 'mailroom-aggregator-'));
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

function finding(overrides: Partial<Finding>): Finding {
  return {
    sessionId: 'S',
    category: 'web',
    filename: 'f.md',
    path: '/tmp/f.md',
    content: '',
    ...overrides,
  };
}

describe('renderSynthesis', () => {
  it('groups findings by category with one section per finding', () => {
    const text = renderSynthesis('S', [
      finding({ category: 'web', filename: '20261019-143052-aaaaaaaa.md', content: 'A' }),
      finding({ category: 'local', filename: '20261019-143052-cccccccc.md', content: 'C\n\n' }),
    ]);

    assert.equal(text, [
      '# Synthesized Findings',
      '',
      'Session: S',
      'Findings: 2',
      '',
      '## Web Search (web)',
      '',
      '### 20261019-143052-aaaaaaaa.md',
      '',
      'A',
      '',
      '## Local Search (local)',
      '',
      '### 20261019-143052-cccccccc.md',
      '',
      'C',
      '',
    ].join('\n'));
  });

  it('notes when there is nothing to combine', () => {
    assert.equal(
      renderSynthesis('S', []),
      '# Synthesized Findings\n\nSession: S\nFindings: 0\n\nNo findings were recorded for this session.\n',
    );
  });
});

describe('synthesize', () => {
  it('writes the output artifact and marks the session complete', () => {
    const config = testConfig(testDir);
    const { id } = createSession(config);
    writeFinding(config, id, 'web', 'A');
    writeFinding(config, id, 'fetch', 'B');

    const output = synthesize(config, id);
    assert.equal(output.path, finalResponsePath(config, id));
    assert.equal(output.findingCount, 2);
    assert.equal(readFileSync(output.path, 'utf-8'), output.content);

    const status = currentStatus(config, id);
    assert.equal(status?.phase, 'complete');
    assert.equal(status?.message, 'Synthesized 2 finding(s) into output/final-response.md');
  });

  it('records synthesizing before complete', () => {
    const config = testConfig(testDir);
    const { id } = createSession(config);
    synthesize(config, id);

    const phases = statusHistory(config, id).map(r => r.phase);
    assert.deepStrictEqual(phases, ['created', 'synthesizing', 'complete']);
  });

  it('produces byte-identical output when nothing changed', () => {
    const config = testConfig(testDir);
    const { id } = createSession(config);
    writeFinding(config, id, 'web', 'A');
    writeFinding(config, id, 'local', 'C');

    const first = readFileSync(synthesize(config, id).path);
    const second = readFileSync(synthesize(config, id).path);
    assert.ok(first.equals(second));
  });

  it('picks up findings added since the previous run', () => {
    const config = testConfig(testDir);
    const { id } = createSession(config);
    writeFinding(config, id, 'web', 'A');
    synthesize(config, id);

    writeFinding(config, id, 'fetch', 'late arrival');
    const rerun = synthesize(config, id);
    assert.equal(rerun.findingCount, 2);
    assert.match(readFileSync(rerun.path, 'utf-8'), /late arrival/);
  });

  it('throws SessionNotFound for an unknown session', () => {
    const config = testConfig(testDir);
    assert.throws(() => synthesize(config, 'ghost'), SessionNotFoundError);
  });
});
