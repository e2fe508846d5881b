/**
 * Events module.
 *
 * Provides event names and the typed emitter shared by the registry and
 * the resolver.
 */

// Event emitter
export {
  type WrapperDeclaredPayload,
  WrapperEventEmitter,
  type WrapperEventMap,
  type WrapperFailedPayload,
  type WrapperLayeredPayload,
  type WrapperResolvedPayload,
  type WrapperSubclassedPayload,
} from './event-emitter.js';
// Event names
export {
  type EventName,
  EventNames,
  type RegistryEventName,
  RegistryEventNames,
  type ResolverEventName,
  ResolverEventNames,
} from './event-names.js';
