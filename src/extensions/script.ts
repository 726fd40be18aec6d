// src/extensions/script.ts

import fs from 'fs';
import path from 'path';
import vm from 'vm';
import type { Extension, FunctionMap, ScaffoldConfig } from '../schema';
import { fsOp } from '../core/errors';
import { escapeRegExp, toPosixPath } from '../util/fs-utils';
import type { Logger } from '../util/logger';
import { defaultLogger } from '../util/logger';

export const DEFAULT_SCRIPT = 'template.js';

export interface ScriptExtensionOptions {
   /**
    * Receives the script's console output.
    * Defaults to defaultLogger.child('[script]').
    */
   logger?: Logger;
}

type ConsoleFn = (...args: unknown[]) => void;

function makeConsole(logger: Logger): Record<'log' | 'debug' | 'warn' | 'error', ConsoleFn> {
   return {
      log: (...args) => logger.info('log:', ...args),
      debug: (...args) => logger.debug('debug:', ...args),
      warn: (...args) => logger.warn('warn:', ...args),
      error: (...args) => logger.error('error:', ...args),
   };
}

/**
 * Run the template's own script and register the functions it defines.
 *
 * The script lives at `scriptPath` inside the template tree and is never
 * copied to the output (name a file `template.js.tmpl` to generate one).
 * It runs in a separate V8 context whose globals are:
 *
 * - every template function registered so far, callable positionally
 * - `context`, the scaffold context
 * - `console`, forwarded to the logger
 *
 * Top-level `function` declarations become template functions under their
 * own name. A missing script is not an error.
 *
 * @example
 * ```js
 * // template.js
 * function greeting() {
 *   return 'Hello ' + upper(context.name);
 * }
 * ```
 */
export function scriptExtension(
   scriptPath: string = DEFAULT_SCRIPT,
   options: ScriptExtensionOptions = {},
): Extension {
   const logger = options.logger ?? defaultLogger.child('[script]');

   return {
      name: `script ${scriptPath}`,
      extend(config: ScaffoldConfig) {
         config.exclude.push(`^${escapeRegExp(toPosixPath(scriptPath))}$`);

         const fullPath = path.join(config.source, scriptPath);
         if (!fs.existsSync(fullPath)) {
            logger.debug(`no script at ${fullPath}`);
            return;
         }

         const code = fsOp('read file', fullPath, () => fs.readFileSync(fullPath, 'utf8'));
         const hostFunctions: FunctionMap = { ...config.functions };
         const sandbox: Record<string, unknown> = {
            ...hostFunctions,
            context: config.context,
            console: makeConsole(logger),
         };

         const vmContext = vm.createContext(sandbox, { name: fullPath });
         new vm.Script(code, { filename: fullPath }).runInContext(vmContext);

         for (const [name, value] of Object.entries(sandbox)) {
            if (typeof value !== 'function') continue;
            if (hostFunctions[name] === value) continue;
            config.functions[name] = (...args: unknown[]) => Reflect.apply(value, sandbox, args);
            logger.debug(`registered script function ${name}()`);
         }
      },
   };
}
