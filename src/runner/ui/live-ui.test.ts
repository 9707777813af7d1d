import { describe, expect, it, vi } from 'vitest';

import type { RowMeta } from '@/runner/progress/types';

import { LiveUI } from './live-ui';

const frames = vi.hoisted(() => {
  const bodies: string[] = [];
  return { bodies, done: { count: 0 } };
});

vi.mock('log-update', () => ({
  default: Object.assign(
    (body: string) => {
      frames.bodies.push(body);
    },
    {
      done: () => {
        frames.done.count += 1;
      },
    },
  ),
}));

const build: RowMeta = { phase: 'build', item: 'consolidate' };

describe('LiveUI', () => {
  it('repaints on every row change and persists a hint-free final frame', () => {
    const ui = new LiveUI({ boring: true, refreshMs: 60_000 });
    ui.start();
    ui.onPhaseQueued(build);
    ui.onPhaseStart(build);
    ui.onPhaseProgress(build, { count: 1 });
    ui.onPhaseEnd(build, { kind: 'done' });

    // queue, start, progress, end + immediate flush
    expect(frames.bodies).toHaveLength(5);
    expect(frames.bodies[0]).toContain('[WAIT]');
    expect(frames.bodies[4]).toContain('Press Ctrl+C to cancel');

    ui.stop();
    ui.stop();
    expect(frames.done.count).toBe(1);
    const last = frames.bodies.at(-1) ?? '';
    expect(last).not.toContain('Press Ctrl+C');
    expect(last).toMatch(/\n\nelapsed \d{2}:\d{2} {2}ok 1\n$/);
  });
});
