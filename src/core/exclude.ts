// src/core/exclude.ts

import { ScaffoldError, describeError } from './errors';

export interface ExcludeMatcher {
   isExcluded(relPath: string): boolean;
}

/**
 * Compile exclusion regexes. Patterns are unanchored: `node_modules`
 * matches anywhere in the path, `^docs/` only at the top level.
 */
export function compileExcludes(patterns: readonly string[]): ExcludeMatcher {
   const compiled = patterns.map((pattern) => {
      try {
         return new RegExp(pattern);
      } catch (err) {
         throw new ScaffoldError(
            'config',
            `invalid exclude pattern "${pattern}": ${describeError(err)}`,
            { cause: err },
         );
      }
   });

   return {
      isExcluded: (relPath) => compiled.some((re) => re.test(relPath)),
   };
}
