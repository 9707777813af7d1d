/* src/runner/progress/sinks/base.ts
 * Minimal base for progress sinks:
 * - Centralizes ProgressModel subscribe/unsubscribe lifecycle.
 * - Subclasses provide onUpdate(meta, state).
 */
import type { ProgressModel } from '@/runner/progress/model';
import type { PhaseState, RowMeta } from '@/runner/progress/types';

export abstract class BaseSink {
  protected constructor(protected readonly model: ProgressModel) {}

  private unsub?: () => void;

  /** Idempotent subscribe to the model; dispatches to subclass onUpdate. */
  protected subscribeModel(): void {
    if (this.unsub) return;
    this.unsub = this.model.subscribe((e) => {
      this.onUpdate(e.meta, e.state);
    });
  }

  /** Idempotent unsubscribe from the model. */
  protected unsubscribeModel(): void {
    this.unsub?.();
    this.unsub = undefined;
  }

  abstract start(): void;
  abstract stop(): void;

  /** Subclasses implement row handling for progress updates. */
  protected abstract onUpdate(meta: RowMeta, state: PhaseState): void;
}
