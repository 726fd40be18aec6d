// src/core/scaffold.ts

import fs from 'fs';
import path from 'path';
import type {
   FunctionMap,
   ScaffoldConfig,
   ScaffoldOptions,
   ScaffoldResult,
} from '../schema';
import { compileExcludes } from './exclude';
import { ExtensionRunner } from './extension-runner';
import { ScaffoldError, fsOp } from './errors';
import { DeferredSymlinks } from './symlinks';
import { evaluate } from './template';
import { SKIP, describeEntryType, walkDir, type WalkEntry } from './walk-dir';
import { ensureDirSync, lstatSafeSync, removePathSync, toPosixPath } from '../util/fs-utils';
import type { Logger } from '../util/logger';
import { defaultLogger } from '../util/logger';

export const DEFAULT_TEMPLATE_SUFFIX = '.tmpl';

/**
 * One materialized copy of a source directory: where it was written and
 * which context its children render against.
 */
interface Instance {
   dir: string;
   context: unknown;
}

interface Destination {
   path: string;
   context: unknown;
}

function pathOnly(name: string): never {
   throw new Error(`${name}() can only be used in file and directory names`);
}

/**
 * Placeholders so `dir`/`dirEach` are known names everywhere; the working
 * versions are injected per entry while its name is rendered.
 */
const PATH_FUNCTION_PLACEHOLDERS: FunctionMap = {
   dir: () => pathOnly('dir'),
   dirEach: () => pathOnly('dirEach'),
};

function fanOutName(name: unknown): string {
   if (typeof name === 'number') return String(name);
   if (typeof name !== 'string' || name === '') {
      throw new Error(`dir() expects a non-empty name, got ${JSON.stringify(name)}`);
   }
   return name;
}

/**
 * Build the function table for rendering one entry name. `dir(name, ctx)`
 * records a fan-out target instead of contributing to the output; it emits
 * a NUL sentinel so several calls never read as literal text.
 */
function pathFunctions(base: FunctionMap, fanOut: Map<string, unknown>): FunctionMap {
   const dir = (name: unknown, subContext: unknown): string => {
      const key = fanOutName(name);
      fanOut.set(key, subContext);
      return `${key}\u0000`;
   };

   const dirEach = (items: unknown, key: unknown): string => {
      if (!Array.isArray(items)) {
         throw new Error('dirEach() expects a list as its first argument');
      }
      if (typeof key !== 'string') {
         throw new Error('dirEach() expects a field name as its second argument');
      }
      return items
         .map((item: unknown) => {
            const value: unknown =
               typeof item === 'object' && item !== null
                  ? Object.entries(item).find(([field]) => field === key)?.[1]
                  : undefined;
            return dir(value, item);
         })
         .join('');
   };

   return { ...base, dir, dirEach };
}

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * File content as text, or undefined for binary content (invalid UTF-8 or
 * NUL bytes), which is copied without rendering.
 */
function decodeText(bytes: Buffer): string | undefined {
   if (bytes.includes(0)) return undefined;
   try {
      return utf8.decode(bytes);
   } catch {
      return undefined;
   }
}

function stripSuffix(filePath: string, suffix: string): string {
   return suffix && filePath.endsWith(suffix)
      ? filePath.slice(0, -suffix.length)
      : filePath;
}

/**
 * Render `source` into `destination` using `context`.
 *
 * Every path segment, file body and symlink target in `source` is a
 * template. Entries whose name renders to "" are omitted together with
 * their subtree; `dir(name, ctx)` in a name fans the entry out into one
 * sibling per call; the template suffix is removed from destination names.
 * Symlinks are created after the whole tree has been written.
 *
 * The first failure aborts the run. Entries written before it stay on disk.
 */
export function scaffold(
   source: string,
   destination: string,
   context: unknown,
   options: ScaffoldOptions = {},
): ScaffoldResult {
   const logger = options.logger ?? defaultLogger.child('[scaffold]');
   const sourceAbs = path.resolve(source);
   const targetAbs = path.resolve(destination);
   const suffix = options.templateSuffix ?? DEFAULT_TEMPLATE_SUFFIX;

   const config: ScaffoldConfig = {
      context,
      functions: { ...PATH_FUNCTION_PLACEHOLDERS, ...options.functions },
      exclude: [...(options.exclude ?? [])],
      source: sourceAbs,
      target: targetAbs,
   };

   const extensions = new ExtensionRunner(options.extensions ?? [], targetAbs);
   extensions.runExtend(config);

   const excludes = compileExcludes(config.exclude);
   const symlinks = new DeferredSymlinks(targetAbs, logger.child('[symlinks]'));
   const result: ScaffoldResult = { directories: [], files: [], symlinks: [] };

   // Source directory -> every place it was materialized.
   const instances = new Map<string, Instance[]>();

   function display(absPath: string): string {
      return toPosixPath(path.relative(targetAbs, absPath)) || '.';
   }

   function destinationsFor(relPath: string, entry: WalkEntry, parent: Instance): Destination[] {
      const fanOut = new Map<string, unknown>();
      const rendered = evaluate(
         relPath,
         entry.name,
         parent.context,
         pathFunctions(config.functions, fanOut),
      );

      if (rendered === '') return [];

      if (fanOut.size === 0) {
         return [{ path: stripSuffix(path.join(parent.dir, rendered), suffix), context: parent.context }];
      }

      return [...fanOut].map(([name, subContext]) => ({
         path: stripSuffix(path.join(parent.dir, name), suffix),
         context: subContext,
      }));
   }

   function materialize(
      srcPath: string,
      relPath: string,
      entry: WalkEntry,
      dest: Destination,
   ): Instance | undefined {
      switch (entry.kind) {
         case 'directory': {
            ensureDirSync(dest.path);
            result.directories.push(dest.path);
            logger.info(`created ${display(dest.path)}/`);
            extensions.runAfterEach(dest.path);
            return { dir: dest.path, context: dest.context };
         }

         case 'file': {
            const raw = fsOp('read file', srcPath, () => fs.readFileSync(srcPath));
            const template = decodeText(raw);
            let content: string | Buffer = raw;
            if (template === undefined) {
               logger.debug(`copying binary ${relPath} unrendered`);
            } else {
               content = evaluate(relPath, template, dest.context, config.functions);
            }
            const existing = fsOp('stat', dest.path, () => lstatSafeSync(dest.path));
            if (existing?.isSymbolicLink()) {
               removePathSync(dest.path);
            }
            fsOp('write file', dest.path, () => {
               fs.writeFileSync(dest.path, content);
               // source mode verbatim, regardless of umask
               fs.chmodSync(dest.path, entry.stats.mode & 0o7777);
            });
            result.files.push(dest.path);
            logger.info(`created ${display(dest.path)}`);
            extensions.runAfterEach(dest.path);
            return undefined;
         }

         case 'symlink': {
            const rawTarget = fsOp('read symlink', srcPath, () => fs.readlinkSync(srcPath));
            let target = evaluate(relPath, rawTarget, dest.context, config.functions);
            if (path.isAbsolute(target)) {
               target = path.relative(path.dirname(dest.path), target);
            }
            symlinks.record(dest.path, target);
            logger.debug(`deferred symlink ${display(dest.path)} -> ${target}`);
            return undefined;
         }

         default:
            throw new ScaffoldError(
               'unsupported',
               `${srcPath}: unsupported file type ${describeEntryType(entry.stats)}`,
               { path: srcPath },
            );
      }
   }

   walkDir(sourceAbs, (srcPath, entry) => {
      if (srcPath === sourceAbs) {
         ensureDirSync(targetAbs);
         instances.set(srcPath, [{ dir: targetAbs, context: config.context }]);
         return undefined;
      }

      const relPath = toPosixPath(path.relative(sourceAbs, srcPath));
      if (excludes.isExcluded(relPath)) {
         logger.debug(`excluded ${relPath}`);
         return SKIP;
      }

      const children: Instance[] = [];
      for (const parent of instances.get(path.dirname(srcPath)) ?? []) {
         const destinations = destinationsFor(relPath, entry, parent);
         if (destinations.length === 0) {
            logger.debug(`omitted ${relPath} (empty name)`);
         }
         for (const dest of destinations) {
            const instance = materialize(srcPath, relPath, entry, dest);
            if (instance) children.push(instance);
         }
      }

      if (entry.kind !== 'directory') return undefined;
      if (children.length === 0) return SKIP;
      instances.set(srcPath, children);
      return undefined;
   });

   result.symlinks = symlinks.applyAll();
   return result;
}
