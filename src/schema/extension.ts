// src/schema/extension.ts

import type { ScaffoldConfig } from './config';

/**
 * Glob filter evaluated against the destination path of an entry,
 * relative to the destination root, with forward slashes.
 */
export interface PathFilter {
   /**
    * Glob patterns which must match for `afterEach` to run.
    * If provided, at least one pattern must match.
    */
   include?: string[];

   /**
    * Glob patterns which, if any match, prevent `afterEach` from running.
    */
   exclude?: string[];
}

/**
 * An extension hooks into a scaffold run at two points.
 *
 * Both capabilities are optional; implement whichever you need.
 */
export interface Extension {
   /**
    * Label used in error messages and logs.
    */
   name?: string;

   /**
    * Called once, in registration order, before any file is written.
    * May add functions, append exclusions or replace the context.
    */
   extend?(config: ScaffoldConfig): void;

   /**
    * Called for every directory and regular file after it has been written,
    * with its absolute destination path. Not called for symlinks.
    */
   afterEach?(path: string): void;

   /**
    * Restricts which paths `afterEach` is called for.
    */
   filter?: PathFilter;
}

export type ExtendFn = (config: ScaffoldConfig) => void;
export type AfterEachFn = (path: string) => void;

/**
 * Build an extension that only mutates the configuration.
 */
export function extendWith(fn: ExtendFn, name?: string): Extension {
   return { name, extend: fn };
}

/**
 * Build an extension that is only notified of materialized paths.
 *
 * Useful for setting file permissions, formatting generated files, etc.
 */
export function afterEach(fn: AfterEachFn, filter?: PathFilter, name?: string): Extension {
   return { name, afterEach: fn, filter };
}
