// src/core/extension-runner.ts

import path from 'path';
import { minimatch } from 'minimatch';
import type { Extension, PathFilter, ScaffoldConfig } from '../schema';
import { ScaffoldError, describeError } from './errors';
import { toPosixPath } from '../util/fs-utils';

function matchesFilter(pathRel: string, filter: PathFilter): boolean {
   const { include, exclude } = filter;

   if (include?.length) {
      const ok = include.some((p) => minimatch(pathRel, p, { dot: true }));
      if (!ok) return false;
   }

   if (exclude?.length) {
      const blocked = exclude.some((p) => minimatch(pathRel, p, { dot: true }));
      if (blocked) return false;
   }

   return true;
}

function label(extension: Extension, index: number): string {
   return extension.name ?? `extension #${index + 1}`;
}

export class ExtensionRunner {
   constructor(
      private readonly extensions: readonly Extension[],
      private readonly target: string,
   ) { }

   /**
    * Let every extension mutate the configuration, in registration order.
    */
   runExtend(config: ScaffoldConfig): void {
      this.extensions.forEach((extension, index) => {
         if (!extension.extend) return;
         try {
            extension.extend(config);
         } catch (err) {
            throw new ScaffoldError(
               'extension',
               `${label(extension, index)} failed to extend scaffolder: ${describeError(err)}`,
               { phase: 'extend', cause: err },
            );
         }
      });
   }

   /**
    * Notify every extension whose filter matches that `absPath` was written.
    */
   runAfterEach(absPath: string): void {
      const rel = toPosixPath(path.relative(this.target, absPath));
      this.extensions.forEach((extension, index) => {
         if (!extension.afterEach) return;
         if (extension.filter && !matchesFilter(rel, extension.filter)) return;
         try {
            extension.afterEach(absPath);
         } catch (err) {
            throw new ScaffoldError(
               'extension',
               `${label(extension, index)} failed after ${rel}: ${describeError(err)}`,
               { phase: 'afterEach', path: absPath, cause: err },
            );
         }
      });
   }
}
