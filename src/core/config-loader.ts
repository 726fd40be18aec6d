// src/core/config-loader.ts

import fs from 'fs';
import path from 'path';
import os from 'os';
import crypto from 'crypto';
import { createRequire } from 'module';
import { transform } from 'esbuild';

import type { Extension, FunctionMap, PathFilter, ScaffoldConfig } from '../schema';
import { ScaffoldError, describeError, fsOp } from './errors';
import { defaultLogger } from '../util/logger';
import { ensureDirSync } from '../util/fs-utils';

const TS_EXTENSIONS = new Set(['.ts', '.mts', '.cts']);
const JS_EXTENSIONS = new Set(['.js', '.cjs']);

/**
 * Shape of a config module's default export.
 *
 * @example
 * ```ts
 * import type { ScaffolderFileConfig } from 'tree-scaffolder';
 *
 * const config: ScaffolderFileConfig = {
 *   exclude: ['^\\.git/'],
 *   functions: { year: () => new Date().getFullYear() },
 * };
 *
 * export default config;
 * ```
 */
export interface ScaffolderFileConfig {
   context?: unknown;
   functions?: FunctionMap;
   exclude?: string[];
   extensions?: Extension[];
   templateSuffix?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
   return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(configPath: string, message: string): ScaffoldError {
   return new ScaffoldError('config', `invalid config ${configPath}: ${message}`, {
      path: configPath,
   });
}

function toStringList(value: unknown, field: string, configPath: string): string[] {
   if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
      throw invalid(configPath, `"${field}" must be a list of strings`);
   }
   return value;
}

function toFunctionMap(value: unknown, configPath: string): FunctionMap {
   if (!isRecord(value)) {
      throw invalid(configPath, '"functions" must be an object of functions');
   }
   const functions: FunctionMap = {};
   for (const [name, fn] of Object.entries(value)) {
      if (typeof fn !== 'function') {
         throw invalid(configPath, `function "${name}" is not a function`);
      }
      functions[name] = (...args: unknown[]) => Reflect.apply(fn, undefined, args);
   }
   return functions;
}

function toFilter(value: unknown, index: number, configPath: string): PathFilter | undefined {
   if (value === undefined) return undefined;
   if (!isRecord(value)) {
      throw invalid(configPath, `extensions[${index}].filter must be an object`);
   }
   return {
      include: value.include === undefined
         ? undefined
         : toStringList(value.include, `extensions[${index}].filter.include`, configPath),
      exclude: value.exclude === undefined
         ? undefined
         : toStringList(value.exclude, `extensions[${index}].filter.exclude`, configPath),
   };
}

function optionalFunction(value: unknown, field: string, configPath: string): Function | undefined {
   if (value === undefined) return undefined;
   if (typeof value !== 'function') {
      throw invalid(configPath, `${field} must be a function`);
   }
   return value;
}

function toExtension(value: unknown, index: number, configPath: string): Extension {
   if (!isRecord(value)) {
      throw invalid(configPath, `extensions[${index}] must be an object`);
   }
   const { name } = value;
   if (name !== undefined && typeof name !== 'string') {
      throw invalid(configPath, `extensions[${index}].name must be a string`);
   }
   const extend = optionalFunction(value.extend, `extensions[${index}].extend`, configPath);
   const afterEach = optionalFunction(value.afterEach, `extensions[${index}].afterEach`, configPath);

   return {
      name: typeof name === 'string' ? name : undefined,
      extend: extend
         ? (config: ScaffoldConfig) => {
            Reflect.apply(extend, value, [config]);
         }
         : undefined,
      afterEach: afterEach
         ? (filePath: string) => {
            Reflect.apply(afterEach, value, [filePath]);
         }
         : undefined,
      filter: toFilter(value.filter, index, configPath),
   };
}

/**
 * Check a loaded module's default export against ScaffolderFileConfig.
 */
export function validateConfig(value: unknown, configPath: string): ScaffolderFileConfig {
   if (!isRecord(value)) {
      throw invalid(configPath, 'default export must be an object');
   }

   const config: ScaffolderFileConfig = {};
   if ('context' in value) config.context = value.context;
   if (value.functions !== undefined) {
      config.functions = toFunctionMap(value.functions, configPath);
   }
   if (value.exclude !== undefined) {
      config.exclude = toStringList(value.exclude, 'exclude', configPath);
   }
   if (value.extensions !== undefined) {
      if (!Array.isArray(value.extensions)) {
         throw invalid(configPath, '"extensions" must be a list');
      }
      config.extensions = value.extensions.map((ext: unknown, i: number) =>
         toExtension(ext, i, configPath),
      );
   }
   if (value.templateSuffix !== undefined) {
      if (typeof value.templateSuffix !== 'string') {
         throw invalid(configPath, '"templateSuffix" must be a string');
      }
      config.templateSuffix = value.templateSuffix;
   }
   return config;
}

/**
 * Load a config module.
 * - .ts/.mts/.cts are transpiled with esbuild to CommonJS and loaded from a temp file.
 * - .js/.cjs are required directly.
 */
export async function loadScaffolderConfig(configPath: string): Promise<ScaffolderFileConfig> {
   const absPath = path.resolve(configPath);
   const ext = path.extname(absPath).toLowerCase();

   if (!fs.existsSync(absPath)) {
      throw new ScaffoldError('config', `config file not found: ${absPath}`, { path: absPath });
   }

   let modulePath: string;
   if (TS_EXTENSIONS.has(ext)) {
      modulePath = await transpileTsConfig(absPath);
   } else if (JS_EXTENSIONS.has(ext)) {
      modulePath = absPath;
   } else {
      throw new ScaffoldError(
         'config',
         `unsupported config file ${absPath}; expected one of ${[...TS_EXTENSIONS, ...JS_EXTENSIONS].join(', ')}`,
         { path: absPath },
      );
   }

   let mod: unknown;
   try {
      mod = createRequire(absPath)(modulePath);
   } catch (err) {
      throw new ScaffoldError(
         'config',
         `failed to load config ${absPath}: ${describeError(err)}`,
         { path: absPath, cause: err },
      );
   }

   const exported = isRecord(mod) && 'default' in mod ? mod.default : mod;
   defaultLogger.child('[config]').debug(`Loaded config from ${absPath}`);
   return validateConfig(exported, absPath);
}

/**
 * Transpile a TS config file to CommonJS with esbuild and write it to a
 * temp file. Cached on (path + mtime + source).
 */
async function transpileTsConfig(configPath: string): Promise<string> {
   const source = fsOp('read file', configPath, () => fs.readFileSync(configPath, 'utf8'));
   const stat = fsOp('stat', configPath, () => fs.statSync(configPath));

   const hash = crypto
      .createHash('sha1')
      .update(configPath)
      .update(String(stat.mtimeMs))
      .update(source)
      .digest('hex');

   const tmpDir = path.join(os.tmpdir(), 'tree-scaffolder-config');
   ensureDirSync(tmpDir);

   const tmpFile = path.join(tmpDir, `${hash}.cjs`);

   if (!fs.existsSync(tmpFile)) {
      let code: string;
      try {
         const result = await transform(source, {
            loader: 'ts',
            format: 'cjs',
            sourcemap: 'inline',
            sourcefile: configPath,
            target: 'node20',
         });
         code = result.code;
      } catch (err) {
         throw new ScaffoldError(
            'config',
            `failed to compile config ${configPath}: ${describeError(err)}`,
            { path: configPath, cause: err },
         );
      }

      fsOp('write file', tmpFile, () => fs.writeFileSync(tmpFile, code, 'utf8'));
   }

   return tmpFile;
}
