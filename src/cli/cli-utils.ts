/** Shared Commander helpers for the walletdesk CLI.
 * DRY the repeated exitOverride + parse normalization across subcommands.
 */
import type { Command, Option } from 'commander';
import { InvalidArgumentError } from 'commander';

import { loadCliConfigSync } from '@/cli/config/load';
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_CLI_CONFIG_LOAD } from '@/runner/util/debug-scopes';

import type { LoadedCliConfig } from './config/load';

/** Normalize argv from unit tests like ["node","walletdesk", ...] -> [...] */
export const normalizeArgv = (
  argv?: readonly string[],
): readonly string[] | undefined => {
  if (!argv) return undefined;
  if (argv.length >= 2 && argv[0] === 'node' && argv[1] === 'walletdesk') {
    return argv.slice(2);
  }
  return argv;
};

/** Patch parse() and parseAsync() to normalize argv before Commander parses. */
export const patchParseMethods = (cli: Command): void => {
  const origParse = cli.parse.bind(cli);
  const origParseAsync = cli.parseAsync.bind(cli);
  cli.parse = (argv, opts) => {
    origParse(normalizeArgv(argv), opts);
    return cli;
  };
  cli.parseAsync = async (argv, opts) => {
    await origParseAsync(normalizeArgv(argv), opts);
    return cli;
  };
};

const BENIGN_EXITS = new Set<string>([
  'commander.helpDisplayed',
  'commander.unknownCommand',
  'commander.unknownOption',
  'commander.help',
  'commander.version',
]);

/** Install a Commander exit override that swallows benign exits. */
export const installExitOverride = (cmd: Command): void => {
  cmd.exitOverride((err) => {
    if (BENIGN_EXITS.has(err.code)) return;
    throw err;
  });
};

/** Apply both safety adapters to a command. */
export function applyCliSafety(cmd: Command): void {
  installExitOverride(cmd);
  patchParseMethods(cmd);
}

/**
 * Effective value of a flag: an explicit CLI value wins, then the config
 * default, then the built-in.
 */
export const resolveFlag = <T>(
  cmd: Command,
  name: string,
  flag: T | undefined,
  configured: T | undefined,
  builtin: T,
): T =>
  cmd.getOptionValueSource(name) === 'cli' && flag !== undefined
    ? flag
    : (configured ?? builtin);

/** Tag an Option description with (default) when active. */
export function tagDefault(opt: Option, on: boolean): void {
  if (on && !opt.description.includes('(default)')) {
    opt.description = `${opt.description} (default)`;
  }
}

/**
 * Config for help/default tagging. An unreadable or invalid config falls
 * back to built-ins here; the action reports it when it loads the config.
 */
export const loadConfigForDefaults = (
  cwd = process.cwd(),
): LoadedCliConfig | null => {
  try {
    return loadCliConfigSync(cwd);
  } catch (e) {
    debugFallback(
      DBG_SCOPE_CLI_CONFIG_LOAD,
      `defaults unavailable: ${e instanceof Error ? e.message : String(e)}`,
    );
    return null;
  }
};

/** Root-level boolean defaults (debug/boring) from config or built-ins. */
export const rootDefaults = (
  cwd = process.cwd(),
): { debugDefault: boolean; boringDefault: boolean } => {
  const d = loadConfigForDefaults(cwd)?.cliDefaults;
  return {
    debugDefault: d?.debug ?? false,
    boringDefault: d?.boring ?? false,
  };
};

/** Print a failure the way every command reports it and flag the exit code. */
export const reportError = (e: unknown): void => {
  console.error(`walletdesk: ${e instanceof Error ? e.message : String(e)}`);
  process.exitCode = 1;
};

/** Argument parser for millisecond delays (non-negative integers). */
export const parseDelayMs = (v: string): number => {
  const text = v.trim();
  if (!/^\d+$/.test(text)) {
    throw new InvalidArgumentError('expected a non-negative integer (ms).');
  }
  return Number(text);
};
