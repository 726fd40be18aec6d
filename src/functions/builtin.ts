// src/functions/builtin.ts

import pluralize from 'pluralize';
import type { FunctionMap } from '../schema';

/**
 * Split an identifier into words at case changes and at any run of
 * non-alphanumerics.
 *
 * "userProfileID" -> ["user", "Profile", "ID"]
 * "HTTPServer"    -> ["HTTP", "Server"]
 */
export function splitWords(value: unknown): string[] {
   return String(value)
      .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
      .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
      .split(/[^A-Za-z0-9]+/)
      .filter((word) => word.length > 0);
}

function capitalize(word: string): string {
   return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export function snake(value: unknown): string {
   return splitWords(value).map((w) => w.toLowerCase()).join('_');
}

export function screamingSnake(value: unknown): string {
   return splitWords(value).map((w) => w.toUpperCase()).join('_');
}

export function kebab(value: unknown): string {
   return splitWords(value).map((w) => w.toLowerCase()).join('-');
}

export function screamingKebab(value: unknown): string {
   return splitWords(value).map((w) => w.toUpperCase()).join('-');
}

export function camel(value: unknown): string {
   return splitWords(value).map(capitalize).join('');
}

export function lowerCamel(value: unknown): string {
   const [first = '', ...rest] = splitWords(value);
   return first.toLowerCase() + rest.map(capitalize).join('');
}

export function title(value: unknown): string {
   return String(value).replace(/\b[a-z]/g, (c) => c.toUpperCase());
}

export function typename(value: unknown): string {
   if (value === null) return 'null';
   if (typeof value !== 'object') return typeof value;
   if (Object.getPrototypeOf(value) === null) return 'Object';
   return value.constructor.name;
}

/**
 * Functions the CLI registers for every template.
 */
export const builtinFunctions: FunctionMap = {
   snake,
   screamingSnake,
   camel,
   lowerCamel,
   kebab,
   screamingKebab,
   upper: (value: unknown) => String(value).toUpperCase(),
   lower: (value: unknown) => String(value).toLowerCase(),
   title,
   plural: (value: unknown) => pluralize.plural(String(value)),
   singular: (value: unknown) => pluralize.singular(String(value)),
   typename,
};
