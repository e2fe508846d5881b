/**
 * Wrapper specifications.
 *
 * A handler class declares what wraps its responses with one of:
 *
 * | Input                       | Spec kind    | Meaning                                      |
 * |-----------------------------|--------------|----------------------------------------------|
 * | `'standard'`                | `literal`    | Fixed template name                          |
 * | `wrapperMethod('pick')`     | `method`     | Ask the handler's `pick` method at render    |
 * | `Symbol('pick')`            | `method`     | Same, keyed by the symbol's description      |
 * | `(handler) => ...`          | `inline`     | Evaluate a function at render                |
 * | `false`                     | `suppressed` | No wrapper at all                            |
 * | `null` / `undefined`        | `unset`      | Naming convention, then the ancestors        |
 * | `true`                      | (rejected)   | ConfigurationError at declaration            |
 */

import { ConfigurationError } from '../registry/errors.js';
import type { WrapperHost } from './handler.js';

/**
 * Result of a resolution: a normalized template identifier, or false for
 * "no wrapper".
 */
export type WrapperResult = string | false;

/**
 * What a dynamic spec may return. `null`/`undefined` defer to the naming
 * convention and the ancestors.
 */
export type WrapperValue = string | false | null | undefined;

/**
 * Inline wrapper function.
 *
 * Functions declaring a parameter receive the handler; zero-arity functions
 * are called with the handler as `this` only.
 */
// Method syntax keeps the parameter bivariant so a function typed against a
// subclass can be stored next to ones typed against WrapperHost.
export type InlineWrapperFn<H extends WrapperHost = WrapperHost> = {
  bivarianceHack(this: H, handler: H): WrapperValue;
}['bivarianceHack'];

/**
 * Deferred reference to a named method on the handler.
 */
export interface WrapperMethodRef {
  readonly kind: 'method';
  readonly name: string;
}

export type WrapperSpec =
  | { readonly kind: 'literal'; readonly name: string }
  | WrapperMethodRef
  | { readonly kind: 'inline'; readonly fn: InlineWrapperFn }
  | { readonly kind: 'suppressed' }
  | { readonly kind: 'unset' };

export type WrapperSpecKind = WrapperSpec['kind'];

/**
 * Anything accepted by a wrapper declaration.
 *
 * `true` type-checks so that it can be rejected with a descriptive error.
 */
export type WrapperInput<H extends WrapperHost = WrapperHost> =
  | string
  | symbol
  | WrapperMethodRef
  | InlineWrapperFn<H>
  | boolean
  | null
  | undefined;

export const SUPPRESSED: WrapperSpec = Object.freeze({ kind: 'suppressed' });
export const UNSET: WrapperSpec = Object.freeze({ kind: 'unset' });

const INVALID_SPEC_MESSAGE =
  'Wrappers must be specified as strings, method references, functions, false, or null';

/**
 * Create a method reference spec.
 *
 * @example
 * ```typescript
 * class VaultHandler extends BankHandler {
 *   static {
 *     this.wrapper(wrapperMethod('accessLevelWrapper'));
 *   }
 *
 *   accessLevelWrapper(): string {
 *     return this.isAdmin ? 'admin' : 'teller';
 *   }
 * }
 * ```
 */
export function wrapperMethod(name: string): WrapperMethodRef {
  if (name.length === 0) {
    throw new ConfigurationError('Wrapper method name must be a non-empty string');
  }
  return Object.freeze({ kind: 'method', name });
}

function isMethodRef(value: object): value is WrapperMethodRef {
  return 'kind' in value && value.kind === 'method' && 'name' in value && typeof value.name === 'string';
}

/**
 * Convert declaration input into a spec.
 *
 * @throws ConfigurationError for `true` and any other unsupported value
 */
export function toWrapperSpec<H extends WrapperHost>(input: WrapperInput<H>): WrapperSpec {
  if (input === null || input === undefined) {
    return UNSET;
  }

  switch (typeof input) {
    case 'string':
      return Object.freeze({ kind: 'literal', name: input });
    case 'symbol':
      return wrapperMethod(input.description ?? '');
    case 'function':
      return Object.freeze({ kind: 'inline', fn: input });
    case 'boolean':
      if (input) {
        throw new ConfigurationError(INVALID_SPEC_MESSAGE);
      }
      return SUPPRESSED;
    case 'object':
      if (isMethodRef(input)) {
        return wrapperMethod(input.name);
      }
      break;
  }

  throw new ConfigurationError(INVALID_SPEC_MESSAGE);
}

/**
 * Short human-readable form of a spec, for logs and debug output.
 */
export function describeSpec(spec: WrapperSpec): string {
  switch (spec.kind) {
    case 'literal':
      return `literal(${spec.name})`;
    case 'method':
      return `method(${spec.name})`;
    case 'inline':
      return 'inline';
    case 'suppressed':
      return 'suppressed';
    case 'unset':
      return 'unset';
  }
}
