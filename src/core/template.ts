// src/core/template.ts

import Handlebars from 'handlebars';
import type { FunctionMap } from '../schema';
import { ScaffoldError, describeError } from './errors';

type Helper = (...args: unknown[]) => unknown;

// Isolated environment so host-registered global helpers never leak in.
const handlebars = Handlebars.create();

/**
 * Adapt template functions to Handlebars helpers. Handlebars appends an
 * options object to every helper call; it is dropped so functions see
 * exactly the positional arguments written in the template.
 */
function toHelpers(functions: FunctionMap): Record<string, Helper> {
   const helpers: Record<string, Helper> = {};
   for (const [name, fn] of Object.entries(functions)) {
      helpers[name] = (...args: unknown[]) => Reflect.apply(fn, undefined, args.slice(0, -1));
   }
   return helpers;
}

/**
 * Render `text` against `context`.
 *
 * `name` only labels diagnostics. Output is never HTML-escaped.
 */
export function evaluate(
   name: string,
   text: string,
   context: unknown,
   functions: FunctionMap,
): string {
   try {
      const template = handlebars.compile(text, { noEscape: true });
      return template(context, { helpers: toHelpers(functions) });
   } catch (err) {
      throw new ScaffoldError(
         'template',
         `failed to evaluate template ${name}: ${describeError(err)}`,
         { path: name, cause: err },
      );
   }
}
