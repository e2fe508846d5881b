/**
 * Naming convention for implied wrappers.
 *
 * A handler class that declares nothing is wrapped by the template that
 * shares its name: `Weblog::PostsHandler` looks for `wrapperss/weblog/posts`.
 */

import type { HandlerClass } from '../types/handler.js';

/** Conventional wrapper directory. */
export const DEFAULT_WRAPPER_ROOT = 'wrapperss';

const HANDLER_SUFFIX = /(Handler|Controller)$/;
const NAMESPACE_SEPARATOR = /::|\.|\//;

/**
 * Convert a CamelCase segment to snake_case.
 *
 * @example
 * underscore('AdminArea') // 'admin_area'
 * underscore('HTMLPages') // 'html_pages'
 */
export function underscore(segment: string): string {
  return segment
    .replace(/([A-Z\d]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .replace(/-/g, '_')
    .toLowerCase();
}

/**
 * Check whether a class owns the `abstractHandler` flag.
 *
 * Only an own property counts; subclasses of an abstract base are concrete.
 */
export function isAbstractHandler(handlerClass: HandlerClass): boolean {
  return Object.hasOwn(handlerClass, 'abstractHandler') && handlerClass.abstractHandler === true;
}

/**
 * Derive the implied wrapper name of a class.
 *
 * @returns The name (without the wrapper root), or null for anonymous and
 *          abstract classes, which have no conventional wrapper
 */
export function impliedWrapperName(handlerClass: HandlerClass): string | null {
  if (!handlerClass.name || isAbstractHandler(handlerClass)) {
    return null;
  }

  const baseName = handlerClass.name.replace(HANDLER_SUFFIX, '') || handlerClass.name;
  // Namespaces belong to the class itself, like a module path; they are not inherited
  const namespace = Object.hasOwn(handlerClass, 'handlerNamespace')
    ? (handlerClass.handlerNamespace ?? '')
    : '';
  const segments = [...namespace.split(NAMESPACE_SEPARATOR), baseName].filter(
    (segment) => segment.length > 0
  );

  return segments.map(underscore).join('/');
}

function isUnderRoot(name: string, wrapperRoot: string): boolean {
  return name === wrapperRoot || name.startsWith(`${wrapperRoot}/`);
}

/**
 * Search prefixes for an implied name: none when the name already points
 * into the wrapper root, the root otherwise.
 */
export function wrapperPrefixes(impliedName: string, wrapperRoot = DEFAULT_WRAPPER_ROOT): string[] {
  return isUnderRoot(impliedName, wrapperRoot) ? [] : [wrapperRoot];
}

/**
 * Prefix a wrapper identifier with the wrapper root unless already prefixed.
 *
 * @example
 * normalizeWrapper('foo')           // 'wrapperss/foo'
 * normalizeWrapper('wrapperss/foo') // 'wrapperss/foo'
 */
export function normalizeWrapper(value: string, wrapperRoot = DEFAULT_WRAPPER_ROOT): string {
  return isUnderRoot(value, wrapperRoot) ? value : `${wrapperRoot}/${value}`;
}
