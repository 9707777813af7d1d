// src/runner/live/frame.ts
// Compose a full frame body from rows + options (content-only; no I/O).
import type { PhaseState, RowMeta } from '@/runner/progress/types';

import { bodyTable, fmtMs, headerCells, hintLine, renderSummary } from './format';
import { presentRow } from './presentation';
import { computeCounts } from './util';

type InputRow = RowMeta & { state: PhaseState };

export const composeFrameBody = (args: {
  rows: InputRow[];
  startedAt: number;
  boring: boolean;
  includeHint: boolean;
  now?: () => number;
}): string => {
  const { rows: inRows, startedAt, boring, includeHint } = args;
  const now = args.now ?? Date.now;

  const rows: string[][] = [headerCells()];
  if (inRows.length === 0) {
    rows.push(['—', '—', boring ? '[IDLE]' : 'idle', '', '', '']);
  } else {
    for (const row of inRows) {
      const p = presentRow({ state: row.state, now });
      rows.push([row.phase, row.item, p.label, p.progress, p.time, p.detail]);
    }
  }

  // The table pads every cell with one leading space; drop it on each line.
  const tableStr = bodyTable(rows)
    .split('\n')
    .map((l) => (l.startsWith(' ') ? l.slice(1) : l))
    .join('\n');

  const elapsed = fmtMs(now() - startedAt);
  const summary = renderSummary(elapsed, computeCounts(inRows), boring);
  const hint = includeHint ? `\n${hintLine()}` : '';

  // Leading blank line before table; one blank line between table and summary.
  return `\n${tableStr.trimEnd()}\n\n${summary}${hint}\n`;
};
