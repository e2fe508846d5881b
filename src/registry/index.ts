/**
 * Wrapper declaration registry.
 *
 * - `WrapperRegistry`: per-class declarations, one descriptor per class
 * - `HandlerDescriptor`: a class's node in the explicit hierarchy tree
 * - `ResolutionPlan`: what the resolver evaluates for one class
 * - naming helpers: implied names, search prefixes, normalization
 *
 * @example
 * ```typescript
 * import { WrapperRegistry } from './registry';
 *
 * const registry = WrapperRegistry.instance();
 * registry.declare(InformationHandler, 'information');
 * registry.declare(EmployeeHandler, null);
 * registry.layer(InformationHandler, ['chrome']);
 * ```
 */

// Errors
export {
  ConfigurationError,
  describeValue,
  InvalidOverrideError,
  WrapperError,
  WrapperMethodError,
  WrapperNotFoundError,
} from './errors.js';
// Descriptors
export {
  HandlerDescriptor,
  type ResolutionPlan,
  type WrapperEntry,
  type WrapperLayer,
} from './handler-descriptor.js';
// Naming convention
export {
  DEFAULT_WRAPPER_ROOT,
  impliedWrapperName,
  isAbstractHandler,
  normalizeWrapper,
  underscore,
  wrapperPrefixes,
} from './naming.js';
// Registry
export { WrapperRegistry, type WrapperRegistryOptions } from './wrapper-registry.js';
