import type { ConditionsInput } from '../types/conditions.js';
import type { HandlerClass, WrapperHost, WrapperMethod } from '../types/handler.js';
import type { WrapperInput, WrapperSpec } from '../types/wrapper-spec.js';
import { WrapperRegistry } from '../registry/wrapper-registry.js';

/**
 * Base class for request handlers.
 *
 * Subclasses declare their wrapper in a static block. A subclass that
 * declares nothing uses the template named after itself if there is one,
 * and otherwise whatever its parent would use.
 *
 * @example
 * ```typescript
 * class BankHandler extends RequestHandler {}              // wrapperss/bank
 *
 * class InformationHandler extends BankHandler {
 *   static {
 *     this.wrapper('information');                          // wrapperss/information
 *   }
 * }
 *
 * class TillHandler extends BankHandler {
 *   static {
 *     this.wrapper(false);                                  // no wrapper
 *   }
 * }
 *
 * class WeblogHandler extends RequestHandler {
 *   static {
 *     this.wrapper((handler) => (handler.loggedIn ? 'writer' : 'reader'), { except: 'rss' });
 *   }
 *
 *   loggedIn = false;
 * }
 * ```
 */
export class RequestHandler implements WrapperHost {
  /**
   * The base class itself has no conventional wrapper.
   */
  static abstractHandler = true;

  /**
   * Module qualification used to derive the implied wrapper name.
   */
  static handlerNamespace?: string;

  /**
   * Declare the wrapper of this class against the shared registry.
   *
   * @param spec - Template name, `wrapperMethod()` reference, function, false, or null
   * @param conditions - Optional `only` / `except` action filters
   * @throws ConfigurationError if `spec` is `true`
   */
  static wrapper<H extends RequestHandler>(
    this: HandlerClass & { prototype: H },
    spec: WrapperInput<H>,
    conditions?: ConditionsInput
  ): WrapperSpec {
    return WrapperRegistry.instance().declare(this, spec, conditions);
  }

  /**
   * Layer additional wrappers around this class's primary wrapper.
   */
  static layerWrappers(this: HandlerClass, names: readonly string[], conditions?: ConditionsInput): void {
    WrapperRegistry.instance().layer(this, names, conditions);
  }

  /**
   * Name of the action being handled.
   */
  actionName: string;

  private _actionHasWrapper = true;

  constructor(actionName = 'index') {
    this.actionName = actionName;
  }

  /**
   * Whether the current action renders inside a wrapper.
   *
   * Set to false before rendering (or override the getter) to render the
   * action bare, whatever the class declares.
   */
  get actionHasWrapper(): boolean {
    return this._actionHasWrapper;
  }

  set actionHasWrapper(value: boolean) {
    this._actionHasWrapper = value;
  }

  /**
   * The class of this handler.
   */
  get handlerClass(): HandlerClass {
    return this.constructor as typeof RequestHandler;
  }

  /**
   * Look up a method referenced by `wrapperMethod(name)`.
   *
   * Override to expose wrapper methods under names other than their own.
   */
  wrapperMethod(name: string): WrapperMethod | undefined {
    if (name === 'constructor') {
      return undefined;
    }
    const candidate: unknown = Reflect.get(this, name);
    if (typeof candidate !== 'function') {
      return undefined;
    }
    return () => candidate.call(this);
  }

  /**
   * Get a string representation of the handler.
   */
  toString(): string {
    return `${this.constructor.name}(action=${this.actionName})`;
  }
}
