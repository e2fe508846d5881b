/**
 * Contracts between handler classes and the wrapper machinery.
 *
 * The registry and resolver only ever see these shapes, so any object that
 * exposes its class, the current action and the `actionHasWrapper` flag can
 * take part in resolution. `RequestHandler` is the stock implementation.
 */

/**
 * A zero-argument callable returned by {@link WrapperHost.wrapperMethod}.
 */
export type WrapperMethod = () => unknown;

/**
 * A handler instance, as seen by the resolver.
 */
export interface WrapperHost {
  /** Name of the action being rendered (e.g. "index"). */
  readonly actionName: string;

  /** When false, the action renders without any wrapper. */
  readonly actionHasWrapper: boolean;

  /** The class this instance was created from. */
  readonly handlerClass: HandlerClass;

  /**
   * Look up a named wrapper method on this instance.
   *
   * Method-reference specs are resolved through this capability rather than
   * by probing arbitrary properties.
   *
   * @returns A bound callable, or undefined if the handler has no such method
   */
  wrapperMethod(name: string): WrapperMethod | undefined;
}

/**
 * A handler class (constructor) as seen by the registry.
 */
export interface HandlerClass {
  /** Class name; empty for anonymous classes. */
  readonly name: string;

  readonly prototype: WrapperHost;

  /**
   * Module qualification used by the naming convention (own static only), with segments
   * separated by `::`, `.` or `/` (e.g. "Admin::Reports").
   */
  handlerNamespace?: string;

  /**
   * Set as an own static property on base classes that never have a
   * conventional wrapper of their own.
   */
  abstractHandler?: boolean;
}
