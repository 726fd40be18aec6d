// src/core/walk-dir.ts

import fs from 'fs';
import path from 'path';
import { fsOp } from './errors';

/**
 * Returned from a visitor to skip a directory's subtree, or a single
 * non-directory entry.
 */
export const SKIP = Symbol('skip');

export type EntryKind = 'directory' | 'file' | 'symlink' | 'other';

export interface WalkEntry {
   name: string;
   kind: EntryKind;
   /**
    * lstat of the entry (stat for the walk root).
    */
   stats: fs.Stats;
}

export type WalkVisitor = (entryPath: string, entry: WalkEntry) => void | typeof SKIP;

export function entryKind(stats: fs.Stats): EntryKind {
   if (stats.isSymbolicLink()) return 'symlink';
   if (stats.isDirectory()) return 'directory';
   if (stats.isFile()) return 'file';
   return 'other';
}

/**
 * Human-readable type of an entry the engine cannot materialize.
 */
export function describeEntryType(stats: fs.Stats): string {
   if (stats.isSocket()) return 'socket';
   if (stats.isFIFO()) return 'fifo';
   if (stats.isCharacterDevice()) return 'character device';
   if (stats.isBlockDevice()) return 'block device';
   return entryKind(stats);
}

/**
 * Depth-first, pre-order walk of `root`: `visit` runs on a directory before
 * any of its children. Symlinks are reported, never followed.
 *
 * Children are visited in directory listing order. Errors thrown by
 * `visit` abort the walk.
 */
export function walkDir(root: string, visit: WalkVisitor): void {
   const stats = fsOp('stat', root, () => fs.statSync(root));
   walkEntry(root, { name: path.basename(root), kind: entryKind(stats), stats }, visit);
}

function walkEntry(entryPath: string, entry: WalkEntry, visit: WalkVisitor): void {
   if (visit(entryPath, entry) === SKIP) return;
   if (entry.kind !== 'directory') return;

   const names = fsOp('read directory', entryPath, () => fs.readdirSync(entryPath));
   for (const name of names) {
      const childPath = path.join(entryPath, name);
      const stats = fsOp('stat', childPath, () => fs.lstatSync(childPath));
      walkEntry(childPath, { name, kind: entryKind(stats), stats }, visit);
   }
}
