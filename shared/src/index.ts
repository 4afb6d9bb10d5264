// Re-export all shared types and utilities
export * from './types';
export * from './errors';
export * from './logging';
export * from './keyRecords';
export * from './io';
export * from './cli';
export { DateResolver, formatEpoch, formatExpiry } from './dateResolver';
export type { DateResolverOpts } from './dateResolver';
export { GpgCli, buildArmorArgs, defaultExecFileAsync, isNonZeroExit } from './gpgCli';
export type { GpgCliOpts, GpgCliDeps, ExecFileFn, SpawnForStdinFn, ExecFileError, GpgExecResult, ArmorOptions } from './gpgCli';
