/* src/runner/build/status.ts
 * Build status values and their user-facing text.
 */

export type BuildStatus =
  | 'not-started'
  | 'selecting'
  | 'building'
  | 'interrupted'
  | 'finished'
  | 'no-result';

const STATUS_TEXT: Record<BuildStatus, string> = {
  'not-started': 'not started',
  selecting: 'selecting coins...',
  building: 'building transactions...',
  interrupted: 'cancelled',
  finished: 'finished building transactions',
  'no-result': 'finished without generating any transactions',
};

export const statusText = (status: BuildStatus): string => STATUS_TEXT[status];
