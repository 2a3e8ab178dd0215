import type { Config } from '../shared/config.js';
import { finalResponsePath } from '../shared/paths.js';
import { CATEGORIES, type Finding, type OutputArtifact } from '../shared/types.js';
import { atomicWrite } from './fs.js';
import { CATEGORY_LABELS, readFindings } from './findings.js';
import { resolveSession } from './session-manager.js';
import { appendStatus } from './status.js';

// Output must not depend on the clock: re-running over the same findings has
// to reproduce the file byte for byte.
export function renderSynthesis(sessionId: string, findings: Finding[]): string {
  const lines: string[] = ['# Synthesized Findings', '', `Session: ${sessionId}`, `Findings: ${findings.length}`, ''];

  if (findings.length === 0) {
    lines.push('No findings were recorded for this session.', '');
    return lines.join('\n');
  }

  for (const category of CATEGORIES) {
    const group = findings.filter(f => f.category === category);
    if (group.length === 0) continue;
    lines.push(`## ${CATEGORY_LABELS[category]} (${category})`, '');
    for (const finding of group) {
      lines.push(`### ${finding.filename}`, '', finding.content.trimEnd(), '');
    }
  }
  return lines.join('\n');
}

/**
 * Combines whatever findings exist right now into output/final-response.md.
 * Safe to call repeatedly; each call replaces the previous output.
 */
export function synthesize(config: Config, sessionId: string): OutputArtifact {
  const session = resolveSession(config, sessionId);
  appendStatus(config, session.id, 'synthesizing', 'Synthesizing findings');

  const findings = readFindings(config, session.id, 'all');
  const content = renderSynthesis(session.id, findings);
  const path = finalResponsePath(config, session.id);
  atomicWrite(path, content);

  appendStatus(config, session.id, 'complete', `Synthesized ${findings.length} finding(s) into output/final-response.md`);
  return { sessionId: session.id, path, content, findingCount: findings.length };
}
