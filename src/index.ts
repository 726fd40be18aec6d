// src/index.ts

export * from './schema';
export { scaffold, DEFAULT_TEMPLATE_SUFFIX } from './core/scaffold';
export { walkDir, SKIP, entryKind } from './core/walk-dir';
export type { EntryKind, WalkEntry, WalkVisitor } from './core/walk-dir';
export { evaluate } from './core/template';
export { compileExcludes } from './core/exclude';
export type { ExcludeMatcher } from './core/exclude';
export { DeferredSymlinks } from './core/symlinks';
export { ExtensionRunner } from './core/extension-runner';
export { ScaffoldError } from './core/errors';
export type { ScaffoldErrorKind, ExtensionPhase } from './core/errors';
export { loadScaffolderConfig, validateConfig } from './core/config-loader';
export type { ScaffolderFileConfig } from './core/config-loader';
export { runOnce, readJsonContext } from './core/runner';
export type { RunOptions } from './core/runner';
export { scriptExtension, DEFAULT_SCRIPT } from './extensions/script';
export type { ScriptExtensionOptions } from './extensions/script';
export { builtinFunctions } from './functions/builtin';
export { Logger, defaultLogger } from './util/logger';
export type { LogLevel, LoggerOptions } from './util/logger';
