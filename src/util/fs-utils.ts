// src/util/fs-utils.ts

import fs from 'fs';
import path from 'path';
import { fsOp, isErrnoException } from '../core/errors';

/**
 * Owner read/write/execute. Every generated directory gets this mode.
 */
export const DIR_MODE = 0o700;

/**
 * Convert any path to a POSIX-style path with forward slashes.
 */
export function toPosixPath(p: string): string {
   return p.replace(/\\/g, '/');
}

/**
 * Ensure a directory exists (like mkdir -p), creating missing
 * directories with owner-only permissions.
 */
export function ensureDirSync(dirPath: string): string {
   fsOp('create directory', dirPath, () =>
      fs.mkdirSync(dirPath, { recursive: true, mode: DIR_MODE }),
   );
   return dirPath;
}

/**
 * lstat that returns null when nothing exists at the path.
 * Any other failure propagates.
 */
export function lstatSafeSync(targetPath: string): fs.Stats | null {
   try {
      return fs.lstatSync(targetPath);
   } catch (err) {
      if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
         return null;
      }
      throw err;
   }
}

/**
 * Remove whatever sits at `targetPath` (file, symlink or empty directory).
 * A missing path is not an error; a non-empty directory is.
 */
export function removePathSync(targetPath: string): void {
   fsOp('remove', targetPath, () => {
      const stats = lstatSafeSync(targetPath);
      if (!stats) return;
      if (stats.isDirectory()) {
         fs.rmdirSync(targetPath);
      } else {
         fs.unlinkSync(targetPath);
      }
   });
}

/**
 * Check if `target` is inside (or equal to) `base` directory.
 */
export function isSubPath(base: string, target: string): boolean {
   const absBase = path.resolve(base);
   const absTarget = path.resolve(target);

   const baseWithSep = absBase.endsWith(path.sep) ? absBase : absBase + path.sep;
   return absTarget === absBase || absTarget.startsWith(baseWithSep);
}

/**
 * Directories between `base` (exclusive) and `target` (exclusive),
 * outermost first. Empty when `target` is not under `base`.
 */
export function ancestorsWithin(base: string, target: string): string[] {
   const absBase = path.resolve(base);
   const absTarget = path.resolve(target);
   if (!isSubPath(absBase, absTarget) || absBase === absTarget) return [];

   const segments = path.relative(absBase, absTarget).split(path.sep);
   const ancestors: string[] = [];
   let current = absBase;
   for (const segment of segments.slice(0, -1)) {
      current = path.join(current, segment);
      ancestors.push(current);
   }
   return ancestors;
}

/**
 * Escape a literal string for use inside a RegExp.
 */
export function escapeRegExp(text: string): string {
   return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
