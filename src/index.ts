/** Library entry point. */
export * from './runner/build/builder';
export * from './runner/build/status';
export * from './runner/consolidate/options';
export * from './runner/consolidate/session';
export * from './runner/sign/broadcast';
export * from './runner/sign/machine';
export * from './runner/upload/file';
export * from './runner/upload/session';
export * from './wallet/address';
export * from './wallet/backend';
export * from './wallet/errors';
export * from './wallet/snapshot';
export type * from './wallet/types';
export * from './wallet/units';
export { makeCli } from './cli';
export type { CliConfig } from './cli/config/schema';
