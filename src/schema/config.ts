// src/schema/config.ts

import type { Extension } from './extension';
import type { Logger } from '../util/logger';

/**
 * A function callable from templates.
 *
 * Functions receive the positional arguments of the template call
 * (`{{upper Name}}` calls `upper(Name)`) and fail by throwing.
 */
export type TemplateFunction = (...args: never[]) => unknown;

/**
 * Template functions keyed by the name templates call them by.
 */
export type FunctionMap = Record<string, TemplateFunction>;

/**
 * Configuration shared by one scaffold run.
 *
 * Extensions receive this object once, before the source tree is walked,
 * and may add functions, append exclusions or replace the context.
 * It is read-only for the rest of the run.
 */
export interface ScaffoldConfig {
   /**
    * Value templates are rendered against. Its shape is up to the caller;
    * the engine never inspects it.
    */
   context: unknown;

   /**
    * Functions available to every template.
    */
   functions: FunctionMap;

   /**
    * Regular expressions matched against each entry's path relative to
    * `source`, before any template evaluation or suffix removal.
    */
   exclude: string[];

   /**
    * Absolute path of the template tree.
    */
   readonly source: string;

   /**
    * Absolute path of the destination tree.
    */
   readonly target: string;
}

export interface ScaffoldOptions {
   /**
    * Additional template functions, merged over the built-in ones.
    */
   functions?: FunctionMap;

   /**
    * Extensions, run in order.
    */
   extensions?: Extension[];

   /**
    * Exclusion regexes (see `ScaffoldConfig.exclude`).
    */
   exclude?: string[];

   /**
    * Literal suffix marking template files; removed from destination names.
    * Default: ".tmpl"
    */
   templateSuffix?: string;

   /**
    * Optional logger; defaults to defaultLogger.child('[scaffold]').
    */
   logger?: Logger;
}

/**
 * Destination paths materialized by a run, in creation order.
 */
export interface ScaffoldResult {
   directories: string[];
   files: string[];
   symlinks: string[];
}
