// src/cli/upload/options.ts
import type { Command } from 'commander';
import { Option as Opt } from 'commander';

import {
  loadConfigForDefaults,
  parseDelayMs,
  tagDefault,
} from '@/cli/cli-utils';
import { DEFAULT_BROADCAST_DELAY_MS } from '@/runner/sign/broadcast';

export type UploadCliOptions = {
  prevHash?: string;
  receiver?: string;
  upload?: boolean;
  broadcastDelay?: number;
  copy?: boolean;
  live?: boolean;
};

export function attachUploadOptions(sub: Command): void {
  const d = loadConfigForDefaults()?.cliDefaults?.upload;

  sub
    .addOption(
      new Opt(
        '--prev-hash <sha256>',
        'sha256 of the previous version of this file',
      ),
    )
    .addOption(
      new Opt('--receiver <address>', 'address that receives the file'),
    )
    .addOption(
      new Opt('--no-upload', 'sign only; print the URI without broadcasting'),
    )
    .addOption(
      new Opt('--broadcast-delay <ms>', 'pause between broadcasts')
        .argParser(parseDelayMs)
        .default(d?.broadcastDelay ?? DEFAULT_BROADCAST_DELAY_MS),
    );

  const optCopy = new Opt('-c, --copy', 'copy the file URI to the clipboard');
  const optNoCopy = new Opt('-C, --no-copy', 'do not copy the file URI');
  tagDefault(optCopy, Boolean(d?.copy));
  tagDefault(optNoCopy, !d?.copy);
  sub.addOption(optCopy).addOption(optNoCopy);

  const optLive = new Opt('--live', 'render a live progress table');
  const optNoLive = new Opt('--no-live', 'log one line per progress event');
  const live = Boolean(process.stdout.isTTY);
  tagDefault(optLive, live);
  tagDefault(optNoLive, !live);
  sub.addOption(optLive).addOption(optNoLive);
}
