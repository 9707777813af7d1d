/** src/cli/upload/index.ts
 * Upload CLI: thin registry that composes safety, options and action.
 */
import type { Command } from 'commander';

import { applyCliSafety, reportError } from '../cli-utils';
import { runUpload } from './action';
import { attachUploadOptions, type UploadCliOptions } from './options';

/** Register the `upload` subcommand on the provided root CLI. */
export function registerUpload(cli: Command): Command {
  const sub = cli
    .command('upload')
    .argument('<file>', 'file to upload (at most 5261 bytes)')
    .description(
      'Sign a file into a chain of transactions and broadcast them, printing its bitcoinfile: URI',
    );
  applyCliSafety(sub);
  attachUploadOptions(sub);
  sub.action(async (file: string, opts: UploadCliOptions, cmd: Command) => {
    await runUpload(file, opts, cmd).catch(reportError);
  });
  return cli;
}
