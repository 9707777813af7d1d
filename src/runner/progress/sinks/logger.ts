/* src/runner/progress/sinks/logger.ts
 * Line-per-event sink for non-TTY / --no-live output.
 */
import { presentRow } from '@/runner/live/presentation';
import type { ProgressModel } from '@/runner/progress/model';
import type { PhaseState, RowMeta } from '@/runner/progress/types';

import { BaseSink } from './base';

export class LoggerSink extends BaseSink {
  constructor(model: ProgressModel) {
    super(model);
  }

  start(): void {
    this.subscribeModel();
  }

  stop(): void {
    this.unsubscribeModel();
  }

  protected onUpdate(meta: RowMeta, state: PhaseState): void {
    const p = presentRow({ state });
    const progress = p.progress ? ` ${p.progress}` : '';
    const detail = p.detail ? ` -> ${p.detail}` : '';
    console.log(
      `walletdesk: ${p.label} ${meta.phase} "${meta.item}"${progress}${detail}`,
    );
  }
}
