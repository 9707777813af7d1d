// src/runner/live/format.ts
import { table } from 'table';

import { bold, cancel, dim, error, go, ok, warn } from '@/runner/util/color';

import type { StateCounts } from './util';

export const pad2 = (n: number): string => n.toString().padStart(2, '0');

export const fmtMs = (ms: number): string => {
  if (ms < 0) ms = 0;
  const s = Math.floor(ms / 1000);
  const mm = Math.floor(s / 60);
  const ss = s % 60;
  return `${pad2(mm)}:${pad2(ss)}`;
};

export const stripAnsi = (s: string): string =>
  // Remove ANSI CSI sequences (ESC [ ... @-~). Covers SGR and common cursor controls.
  // eslint-disable-next-line no-control-regex
  s.replace(/\x1B\[[0-?]*[ -/]*[@-~]/g, '');

export const HEADERS = [
  'Phase',
  'Item',
  'Status',
  'Progress',
  'Time',
  'Detail',
] as const;

export const headerCells = (): string[] => HEADERS.map((h) => bold(h));

export const bodyTable = (rows: string[][]): string =>
  table(rows, {
    stringLength: (s) => stripAnsi(s).length,
    border: {
      topBody: ``,
      topJoin: ``,
      topLeft: ``,
      topRight: ``,
      bottomBody: ``,
      bottomJoin: ``,
      bottomLeft: ``,
      bottomRight: ``,
      bodyLeft: ``,
      bodyRight: ``,
      bodyJoin: ``,
      joinBody: ``,
      joinLeft: ``,
      joinRight: ``,
      joinJoin: ``,
    },
    drawHorizontalLine: () => false,
    // Left-align every column so headers line up with their content.
    columns: HEADERS.map(() => ({ alignment: 'left' as const })),
  });

/** One-line footer: elapsed time plus per-state counts (zero counts omitted). */
export const renderSummary = (
  elapsed: string,
  counts: StateCounts,
  boring: boolean,
): string => {
  const parts: Array<[number, string, (s: string) => string]> = [
    [counts.waiting, 'waiting', cancel],
    [counts.running, 'running', go],
    [counts.ok, 'ok', ok],
    [counts.empty, 'empty', warn],
    [counts.cancelled, 'cancelled', cancel],
    [counts.fail, 'fail', error],
  ];
  const shown = parts
    .filter(([n]) => n > 0)
    .map(([n, name, paint]) =>
      boring ? `${name} ${String(n)}` : paint(`${name} ${String(n)}`),
    );
  return [`elapsed ${elapsed}`, ...shown].join(boring ? '  ' : ' • ');
};

export const hintLine = (): string =>
  `${dim('Press')} ${bold('Ctrl+C')} ${dim('to cancel')}`;
