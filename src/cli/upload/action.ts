// src/cli/upload/action.ts
import clipboardy from 'clipboardy';
import type { Command } from 'commander';

import { reportError, resolveFlag } from '@/cli/cli-utils';
import { resolveCommandContext } from '@/cli/context';
import { createUI } from '@/runner/ui';
import { UploadSession } from '@/runner/upload/session';
import { isBoring } from '@/runner/util/color';

import type { UploadCliOptions } from './options';

export const runUpload = async (
  file: string,
  opts: UploadCliOptions,
  cmd: Command,
): Promise<void> => {
  const ctx = await resolveCommandContext(process.cwd(), {});
  const d = ctx.config.cliDefaults?.upload;
  const ui = createUI({
    live: resolveFlag(
      cmd,
      'live',
      opts.live,
      undefined,
      Boolean(process.stdout.isTTY),
    ),
    boring: isBoring(),
  });
  const session = new UploadSession({
    backend: ctx.backend,
    ui,
    broadcastDelayMs: opts.broadcastDelay,
  });

  await session.selectFile(file);
  if (opts.prevHash) session.setPreviousHash(opts.prevHash);
  if (opts.receiver) session.setReceiver(opts.receiver);

  ui.start();
  let uri: string | null = null;
  try {
    const signed = await session.sign();
    if (signed.kind === 'failed') {
      reportError(new Error(signed.message));
      return;
    }
    uri = signed.uri;
    if (opts.upload !== false) {
      const res = await session.upload();
      if (res.kind === 'failed') {
        for (const m of res.messages) console.error(`walletdesk: ${m}`);
        process.exitCode = 1;
        return;
      }
    }
  } finally {
    ui.stop();
  }
  if (!uri) return;

  console.log(`walletdesk: ${session.getProgressText()}`);
  console.log(`walletdesk: upload cost ${String(session.getCost())} sat`);
  console.log(`uri: ${uri}`);
  console.log(`sha256: ${session.getSha256() ?? ''}`);
  if (resolveFlag(cmd, 'copy', opts.copy, d?.copy, false)) {
    await clipboardy.write(uri);
    console.log('walletdesk: URI copied to clipboard');
  }
};
