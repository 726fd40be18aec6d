// src/core/runner.ts

import fs from 'fs';
import path from 'path';
import type { Extension, ScaffoldResult } from '../schema';
import { loadScaffolderConfig, type ScaffolderFileConfig } from './config-loader';
import { ScaffoldError, describeError, fsOp } from './errors';
import { scaffold } from './scaffold';
import { builtinFunctions } from '../functions/builtin';
import { DEFAULT_SCRIPT, scriptExtension } from '../extensions/script';
import type { Logger } from '../util/logger';
import { defaultLogger } from '../util/logger';

export interface RunOptions {
   /**
    * Template directory (relative to cwd).
    */
   template: string;

   /**
    * Destination directory (relative to cwd).
    */
   dest: string;

   /**
    * JSON file holding the context. Overrides the config's context.
    */
   jsonPath?: string;

   /**
    * Config module path (relative to cwd).
    */
   configPath?: string;

   /**
    * Extra exclusion regexes, appended after the config's.
    */
   exclude?: string[];

   /**
    * Template script name, or false to disable the script extension.
    * Default: "template.js"
    */
   script?: string | false;

   /**
    * Optional logger override.
    */
   logger?: Logger;
}

export function readJsonContext(jsonPath: string): unknown {
   const raw = fsOp('read file', jsonPath, () => fs.readFileSync(jsonPath, 'utf8'));
   try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
   } catch (err) {
      throw new ScaffoldError(
         'config',
         `failed to decode JSON context ${jsonPath}: ${describeError(err)}`,
         { path: jsonPath, cause: err },
      );
   }
}

/**
 * Run the scaffolder once with built-in functions, the optional config
 * module and the template script extension.
 */
export async function runOnce(cwd: string, options: RunOptions): Promise<ScaffoldResult> {
   const logger = options.logger ?? defaultLogger.child('[runner]');
   const templateDir = path.resolve(cwd, options.template);
   const destDir = path.resolve(cwd, options.dest);

   if (!fs.existsSync(templateDir) || !fs.statSync(templateDir).isDirectory()) {
      throw new ScaffoldError('config', `template directory not found: ${templateDir}`, {
         path: templateDir,
      });
   }

   const fileConfig: ScaffolderFileConfig = options.configPath
      ? await loadScaffolderConfig(path.resolve(cwd, options.configPath))
      : {};

   const context = options.jsonPath
      ? readJsonContext(path.resolve(cwd, options.jsonPath))
      : fileConfig.context ?? {};

   const extensions: Extension[] = [...(fileConfig.extensions ?? [])];
   const script = options.script ?? DEFAULT_SCRIPT;
   if (script !== false) {
      extensions.push(scriptExtension(script, { logger: logger.child('[script]') }));
   }

   logger.debug(
      `Scaffolding ${templateDir} -> ${destDir} (config=${options.configPath ?? 'none'}, script=${script || 'off'})`,
   );

   const result = scaffold(templateDir, destDir, context, {
      functions: { ...builtinFunctions, ...fileConfig.functions },
      extensions,
      exclude: [...(fileConfig.exclude ?? []), ...(options.exclude ?? [])],
      templateSuffix: fileConfig.templateSuffix,
      logger: logger.child('[scaffold]'),
   });

   logger.info(
      `Scaffolded ${result.files.length} file(s), ${result.directories.length} director(ies), ${result.symlinks.length} symlink(s) into ${destDir}`,
   );

   return result;
}
