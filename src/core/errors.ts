// src/core/errors.ts

/**
 * Classification of everything that can abort a scaffold run.
 *
 * - config:      invalid exclusion pattern, malformed config module
 * - template:    parse or execution failure of a template
 * - filesystem:  read/write/mkdir/symlink/remove failures
 * - unsupported: source entry that is not a file, directory or symlink
 * - extension:   an extension failed in `extend` or `afterEach`
 * - symlink:     deferred symlink cycle or missing target
 */
export type ScaffoldErrorKind =
   | 'config'
   | 'template'
   | 'filesystem'
   | 'unsupported'
   | 'extension'
   | 'symlink';

export type ExtensionPhase = 'extend' | 'afterEach';

export interface ScaffoldErrorOptions {
   /** Path the failure relates to (template-relative or absolute). */
   path?: string;
   /** Extension phase, only set for `extension` errors. */
   phase?: ExtensionPhase;
   /** The underlying cause of this error */
   cause?: unknown;
}

/**
 * Base error for every failure raised by the engine.
 *
 * @example
 * ```typescript
 * throw new ScaffoldError('filesystem', 'failed to write file', {
 *   path: '/tmp/out/README.md',
 *   cause: err,
 * });
 * ```
 */
export class ScaffoldError extends Error {
   public readonly kind: ScaffoldErrorKind;
   public readonly path?: string;
   public readonly phase?: ExtensionPhase;
   public readonly cause?: unknown;

   constructor(
      kind: ScaffoldErrorKind,
      message: string,
      options: ScaffoldErrorOptions = {},
   ) {
      super(message);
      this.name = 'ScaffoldError';
      this.kind = kind;
      this.path = options.path;
      this.phase = options.phase;
      this.cause = options.cause;
   }
}

/**
 * Message of anything thrown. Errors raised inside a `vm` context are not
 * `instanceof Error` in the host realm, so this checks the shape instead.
 */
export function describeError(err: unknown): string {
   if (typeof err === 'object' && err !== null && 'message' in err) {
      const { message } = err;
      if (typeof message === 'string') return message;
   }
   return String(err);
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
   return err instanceof Error && 'code' in err;
}

/**
 * Run a filesystem operation, wrapping any failure as a `filesystem`
 * ScaffoldError annotated with the operation and path.
 */
export function fsOp<T>(operation: string, targetPath: string, fn: () => T): T {
   try {
      return fn();
   } catch (err) {
      throw new ScaffoldError(
         'filesystem',
         `failed to ${operation} ${targetPath}: ${describeError(err)}`,
         { path: targetPath, cause: err },
      );
   }
}
