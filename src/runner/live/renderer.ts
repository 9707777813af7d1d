/* src/runner/live/renderer.ts
 * TTY live progress rendering (ProgressRenderer).
 */
import logUpdate from 'log-update';

import type { PhaseState, RowMeta } from '@/runner/progress/types';
import { rowKey } from '@/runner/progress/types';

import { composeFrameBody } from './frame';
import { liveTrace } from './trace';

type Row = RowMeta & { state: PhaseState };
const now = (): number => Date.now();

export class ProgressRenderer {
  private readonly rows = new Map<string, Row>();
  private readonly opts: { boring: boolean; refreshMs: number };
  // Monotonic frame counter for trace correlation
  private frameNo = 0;
  private timer?: NodeJS.Timeout;
  private readonly startedAt = now();

  constructor(args?: { boring?: boolean; refreshMs?: number }) {
    this.opts = {
      boring: Boolean(args?.boring),
      refreshMs: args?.refreshMs ?? 1000,
    };
  }

  start(): void {
    liveTrace.renderer.start({ refreshMs: this.opts.refreshMs });
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.render(true);
    }, this.opts.refreshMs);
    // The refresh timer alone never keeps the process alive.
    this.timer.unref();
  }

  /** Update a row by stable key ("<phase>:<item>") and repaint. */
  update(meta: RowMeta, state: PhaseState): void {
    this.rows.set(rowKey(meta), { ...meta, state });
    this.render(true);
  }

  /** Render one frame now (no stop/persist). */
  flush(): void {
    this.render(true);
  }

  /** Stop refreshing and persist the final frame (hint hidden). */
  finalize(): void {
    liveTrace.renderer.finalize();
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
    this.render(false);
    logUpdate.done();
  }

  private render(includeHint: boolean): void {
    this.frameNo += 1;
    const body = composeFrameBody({
      rows: Array.from(this.rows.values()),
      startedAt: this.startedAt,
      boring: this.opts.boring,
      includeHint,
    });
    liveTrace.renderer.render({
      frameNo: this.frameNo,
      rowsSize: this.rows.size,
    });
    logUpdate(body);
  }
}
