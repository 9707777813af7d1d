import { describe, expect, it } from 'vitest';

import { ProgressModel } from '@/runner/progress/model';
import type { RowMeta } from '@/runner/progress/types';

import { endPhase, progressPhase, queuePhase, startPhase } from './lifecycle';

const meta: RowMeta = { phase: 'build', item: 'consolidate' };
const at = (ms: number) => () => ms;

describe('row lifecycle', () => {
  it('queues, starts, progresses and ends a row', () => {
    const model = new ProgressModel();
    queuePhase(model, meta);
    expect(model.get(meta)).toEqual({ kind: 'waiting' });

    startPhase(model, meta, 'selecting', at(1000));
    progressPhase(model, meta, { count: 2 }, at(1500));
    expect(model.get(meta)).toEqual({
      kind: 'running',
      startedAt: 1000,
      count: 2,
      total: undefined,
      detail: 'selecting',
    });

    endPhase(model, meta, { kind: 'done' }, at(4000));
    expect(model.get(meta)).toEqual({
      kind: 'done',
      durationMs: 3000,
      count: 2,
      total: undefined,
      detail: undefined,
    });
  });

  it('ignores progress after a row has ended', () => {
    const model = new ProgressModel();
    startPhase(model, meta, undefined, at(0));
    endPhase(model, meta, { kind: 'cancelled' }, at(10));
    progressPhase(model, meta, { count: 9 }, at(20));
    expect(model.get(meta)).toMatchObject({ kind: 'cancelled', count: 0 });
  });

  it('starts a waiting row on its first progress', () => {
    const model = new ProgressModel();
    queuePhase(model, meta);
    progressPhase(model, meta, { count: 1, total: 3 }, at(700));
    expect(model.get(meta)).toMatchObject({
      kind: 'running',
      startedAt: 700,
      count: 1,
      total: 3,
    });
  });

  it('reports zero duration for rows that never ran', () => {
    const model = new ProgressModel();
    queuePhase(model, meta);
    endPhase(model, meta, { kind: 'error', detail: 'boom' }, at(5000));
    expect(model.get(meta)).toEqual({
      kind: 'error',
      durationMs: 0,
      detail: 'boom',
    });
  });
});
