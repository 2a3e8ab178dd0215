import type { Command } from 'commander';
import { listFindings } from '../../engine/findings.js';
import { listSessions, readLatest } from '../../engine/session-manager.js';
import { currentStatus } from '../../engine/status.js';
import type { SessionSummary } from '../../shared/types.js';
import type { StorageLocation } from '../../shared/paths.js';
import { commandConfig } from '../context.js';
import { BOLD, DIM, colorizePhase, style } from '../format.js';

export function summarizeSessions(loc: StorageLocation): SessionSummary[] {
  const latest = readLatest(loc);
  return listSessions(loc).map(session => ({
    id: session.id,
    dir: session.dir,
    createdAt: session.createdAt,
    phase: currentStatus(loc, session.id)?.phase ?? null,
    findingCount: listFindings(loc, session.id, 'all')?.length ?? 0,
    latest: session.id === latest,
  }));
}

export function registerListSessions(program: Command): void {
  program
    .command('list-sessions')
    .description('List sessions under the storage root')
    .option('--json', 'Print sessions as a JSON array')
    .action((opts: { json?: boolean }) => {
      const sessions = summarizeSessions(commandConfig(program));
      if (opts.json) {
        console.log(JSON.stringify(sessions, null, 2));
        return;
      }
      if (sessions.length === 0) {
        console.log('No sessions');
        return;
      }
      for (const s of sessions) {
        const phase = s.phase ? colorizePhase(s.phase) : style('unknown', DIM);
        const findings = style(`${s.findingCount} finding(s)`, DIM);
        const marker = s.latest ? `  ${style('(latest)', DIM)}` : '';
        console.log(`  ${style(s.id, BOLD)}  ${phase}  ${findings}  ${s.createdAt}${marker}`);
      }
    });
}
