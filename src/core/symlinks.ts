// src/core/symlinks.ts

import fs from 'fs';
import path from 'path';
import { ScaffoldError, fsOp } from './errors';
import { ancestorsWithin, isSubPath, lstatSafeSync, removePathSync } from '../util/fs-utils';
import type { Logger } from '../util/logger';
import { defaultLogger } from '../util/logger';

/**
 * Symlinks recorded during the walk and created once the whole tree exists.
 *
 * A link is only created after everything its target depends on: the target
 * itself when it is another pending link, and any pending link among the
 * target's parent directories.
 */
export class DeferredSymlinks {
   private readonly pending = new Map<string, string>();
   private readonly logger: Logger;

   constructor(
      private readonly root: string,
      logger?: Logger,
   ) {
      this.logger = logger ?? defaultLogger.child('[symlinks]');
   }

   /**
    * Record `linkPath -> target`. `target` is stored and later written
    * verbatim; a later record for the same path replaces the earlier one.
    */
   record(linkPath: string, target: string): void {
      this.pending.set(path.resolve(linkPath), target);
   }

   get size(): number {
      return this.pending.size;
   }

   has(linkPath: string): boolean {
      return this.pending.has(path.resolve(linkPath));
   }

   /**
    * Create every pending link. Returns the created paths in creation order.
    * Nothing is pending afterwards unless an error was thrown.
    */
   applyAll(): string[] {
      const created: string[] = [];
      for (const linkPath of [...this.pending.keys()]) {
         this.apply(linkPath, [], created);
      }
      return created;
   }

   private apply(linkPath: string, chain: string[], created: string[]): void {
      const target = this.pending.get(linkPath);
      if (target === undefined) return;

      if (chain.includes(linkPath)) {
         const cycle = [...chain.slice(chain.indexOf(linkPath)), linkPath];
         throw new ScaffoldError(
            'symlink',
            `symlink cycle: ${cycle.map((p) => path.relative(this.root, p)).join(' -> ')}`,
            { path: linkPath },
         );
      }

      const targetPath = path.resolve(path.dirname(linkPath), target);
      const nextChain = [...chain, linkPath];
      for (const dir of ancestorsWithin(this.root, targetPath)) {
         this.apply(dir, nextChain, created);
      }
      this.apply(targetPath, nextChain, created);

      this.pending.delete(linkPath);

      if (
         isSubPath(this.root, targetPath) &&
         !fsOp('stat', targetPath, () => lstatSafeSync(targetPath))
      ) {
         throw new ScaffoldError(
            'symlink',
            `symlink ${path.relative(this.root, linkPath)} points at ${target}, which was not generated`,
            { path: linkPath },
         );
      }

      removePathSync(linkPath);
      fsOp('create symlink', linkPath, () => fs.symlinkSync(target, linkPath));
      created.push(linkPath);
      this.logger.debug(`linked ${path.relative(this.root, linkPath)} -> ${target}`);
   }
}
