/**
 * Standard event names for wrapper declaration and resolution.
 */

/**
 * Event names emitted by the registry as handler classes are declared
 * and extended.
 */
export const RegistryEventNames = {
  /** Emitted when a class declares (or redeclares) its wrapper */
  WRAPPER_DECLARED: 'wrapper.declared',

  /** Emitted when a class adds layered wrappers */
  WRAPPER_LAYERED: 'wrapper.layered',

  /** Emitted when a subclass is first attached to its parent descriptor */
  WRAPPER_SUBCLASSED: 'wrapper.subclassed',
} as const;

/**
 * Event names emitted by the resolver once per resolution.
 */
export const ResolverEventNames = {
  /** Emitted when a resolution finishes, with or without a wrapper */
  WRAPPER_RESOLVED: 'wrapper.resolved',

  /** Emitted when a resolution raises */
  WRAPPER_FAILED: 'wrapper.failed',
} as const;

export const EventNames = {
  ...RegistryEventNames,
  ...ResolverEventNames,
} as const;

export type RegistryEventName = (typeof RegistryEventNames)[keyof typeof RegistryEventNames];
export type ResolverEventName = (typeof ResolverEventNames)[keyof typeof ResolverEventNames];
export type EventName = (typeof EventNames)[keyof typeof EventNames];
