/**
 * Type definitions shared by the registry and the resolver.
 *
 * @module types
 */

// Conditions
export {
  type Conditions,
  type ConditionsInput,
  conditionsToJSON,
  hasConditions,
  isConditionallyActive,
  NO_CONDITIONS,
  normalizeConditions,
} from './conditions.js';
// Handler contracts
export type { HandlerClass, WrapperHost, WrapperMethod } from './handler.js';
// Template collaborator
export { type Template, type TemplateLookup, virtualPath } from './template.js';
// Wrapper specs
export {
  describeSpec,
  type InlineWrapperFn,
  SUPPRESSED,
  toWrapperSpec,
  UNSET,
  type WrapperInput,
  type WrapperMethodRef,
  wrapperMethod,
  type WrapperResult,
  type WrapperSpec,
  type WrapperSpecKind,
  type WrapperValue,
} from './wrapper-spec.js';
