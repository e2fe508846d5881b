/**
 * Error types for wrapper declaration and resolution.
 */

/**
 * Render a value the way it should appear inside an error message.
 */
export function describeValue(value: unknown): string {
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'function') {
    return value.name ? `[function ${value.name}]` : '[function]';
  }
  if (value === null || typeof value !== 'object') {
    return String(value);
  }
  try {
    return JSON.stringify(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/**
 * Base error class for all wrapper errors.
 */
export class WrapperError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WrapperError';
  }
}

/**
 * Error thrown for a misconfigured wrapper.
 *
 * Raised at declaration time for specs that can never be valid, and at
 * resolution time for dynamic specs that produce an unusable value.
 */
export class ConfigurationError extends WrapperError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when a method-reference or inline wrapper returns something
 * other than a string, false, or null, or when the referenced method is missing.
 */
export class WrapperMethodError extends ConfigurationError {
  readonly handlerName: string;
  readonly methodName: string;
  readonly returned: unknown;

  constructor(handlerName: string, methodName: string, returned: unknown, missing = false) {
    super(
      missing
        ? `Handler '${handlerName}' does not have wrapper method '${methodName}'`
        : `Your wrapper method '${methodName}' on '${handlerName}' returned ${describeValue(returned)}. ` +
            'It should have returned a string, false, or null'
    );
    this.name = 'WrapperMethodError';
    this.handlerName = handlerName;
    this.methodName = methodName;
    this.returned = returned;
  }
}

/**
 * Error thrown when a render call passes an unusable `wrapper` override.
 */
export class InvalidOverrideError extends ConfigurationError {
  readonly value: unknown;

  constructor(value: unknown) {
    super(`String, function, false, or null expected for 'wrapper'; you passed ${describeValue(value)}`);
    this.name = 'InvalidOverrideError';
    this.value = value;
  }
}

/**
 * Error thrown when a render explicitly requires a wrapper and the whole
 * handler hierarchy produced none.
 */
export class WrapperNotFoundError extends WrapperError {
  readonly handlerName: string;
  readonly searchedPaths: string[];

  constructor(handlerName: string, searchedPaths: string[]) {
    const searched = searchedPaths.length > 0 ? searchedPaths.join(', ') : 'none';
    super(`There was no default wrapper for ${handlerName} in [${searched}]`);
    this.name = 'WrapperNotFoundError';
    this.handlerName = handlerName;
    this.searchedPaths = searchedPaths;
  }
}
