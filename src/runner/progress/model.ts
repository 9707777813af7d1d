/* src/runner/progress/model.ts
 * A tiny evented model for workflow progress. Sinks (live/logger) subscribe to updates.
 */

import { type PhaseState, type RowMeta, rowKey } from './types';

type Row = { meta: RowMeta; state: PhaseState };

export type ProgressListener = (e: {
  key: string;
  meta: RowMeta;
  state: PhaseState;
}) => void;

export class ProgressModel {
  private readonly rows = new Map<string, Row>();
  private readonly listeners = new Set<ProgressListener>();

  subscribe(fn: ProgressListener): () => void {
    this.listeners.add(fn);
    return () => {
      this.listeners.delete(fn);
    };
  }

  /** Drop all rows (used between workflow runs to avoid status carry‑over). */
  clearAll(): void {
    this.rows.clear();
  }

  get(meta: RowMeta): PhaseState | undefined {
    return this.rows.get(rowKey(meta))?.state;
  }

  /** Register or update a row. Emits a change event. */
  update(meta: RowMeta, state: PhaseState): void {
    const key = rowKey(meta);
    this.rows.set(key, { meta, state });
    for (const fn of this.listeners) fn({ key, meta, state });
  }
}
