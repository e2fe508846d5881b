import { loadConfig } from '../config/load-config.js';
import { WrapperEventEmitter } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import { conditionsToJSON, type ConditionsInput, normalizeConditions } from '../types/conditions.js';
import type { HandlerClass, WrapperHost } from '../types/handler.js';
import { describeSpec, toWrapperSpec, type WrapperInput, type WrapperSpec } from '../types/wrapper-spec.js';
import { ConfigurationError } from './errors.js';
import { HandlerDescriptor, type ResolutionPlan } from './handler-descriptor.js';
import { DEFAULT_WRAPPER_ROOT } from './naming.js';

const log = createLogger({ component: 'wrapper_registry' });

/**
 * Options for a registry instance.
 */
export interface WrapperRegistryOptions {
  /** Conventional wrapper directory (default: "wrapperss") */
  wrapperRoot?: string;

  /** Emitter receiving declaration events (default: a new emitter) */
  events?: WrapperEventEmitter;
}

function isHandlerClass(value: unknown): value is HandlerClass {
  return typeof value === 'function' && value !== Function.prototype;
}

/**
 * Registry of wrapper declarations, one descriptor per handler class.
 *
 * Descriptors are created lazily the first time a class is seen, walking
 * the prototype chain so every ancestor is attached first. Declarations
 * replace a class's entry atomically and drop the cached resolution plans
 * of the class and its descendants; nothing else is touched.
 *
 * @example
 * ```typescript
 * const registry = WrapperRegistry.instance();
 *
 * registry.declare(WeblogHandler, 'weblog_standard', { except: 'rss' });
 * registry.declare(TillHandler, false);
 *
 * const plan = registry.planFor(WeblogHandler);
 * plan.spec; // { kind: 'literal', name: 'weblog_standard' }
 * ```
 */
export class WrapperRegistry {
  private static _instance: WrapperRegistry | null = null;

  readonly wrapperRoot: string;
  readonly events: WrapperEventEmitter;

  private _descriptors: Map<HandlerClass, HandlerDescriptor> = new Map();

  constructor(options: WrapperRegistryOptions = {}) {
    const wrapperRoot = (options.wrapperRoot ?? DEFAULT_WRAPPER_ROOT).replace(/^\/+|\/+$/g, '');
    if (wrapperRoot.length === 0) {
      throw new ConfigurationError('Wrapper root must be a non-empty path');
    }
    this.wrapperRoot = wrapperRoot;
    this.events = options.events ?? new WrapperEventEmitter();
  }

  /**
   * Get the singleton registry instance.
   *
   * Handler classes declare against this instance through
   * `RequestHandler.wrapper()`. Its wrapper root comes from `WRAPPERS_ROOT`.
   */
  static instance(): WrapperRegistry {
    if (!WrapperRegistry._instance) {
      WrapperRegistry._instance = new WrapperRegistry({ wrapperRoot: loadConfig().wrapperRoot });
    }
    return WrapperRegistry._instance;
  }

  /**
   * Reset the singleton instance.
   *
   * Declarations made against the previous instance are lost, including
   * those made by class bodies that already ran.
   */
  static resetInstance(): void {
    WrapperRegistry._instance = null;
  }

  /**
   * Get (or create) the descriptor of a class.
   */
  descriptorFor(handlerClass: HandlerClass): HandlerDescriptor {
    const existing = this._descriptors.get(handlerClass);
    if (existing) {
      return existing;
    }

    const parentClass: unknown = Object.getPrototypeOf(handlerClass);
    const parent = isHandlerClass(parentClass) ? this.descriptorFor(parentClass) : null;
    return this.attach(parent, handlerClass);
  }

  /**
   * Attach a subclass to its parent.
   *
   * The child starts without a declaration of its own, so it sees the
   * parent's until it declares; its plan is built from its own name.
   * Calling this again for an already attached pair is a no-op.
   */
  onSubclassCreated(parentClass: HandlerClass, childClass: HandlerClass): HandlerDescriptor {
    const parent = this.descriptorFor(parentClass);
    const existing = this._descriptors.get(childClass);
    if (existing?.parent === parent) {
      return existing;
    }
    if (existing) {
      throw new ConfigurationError(
        `Handler '${existing.handlerName}' is already attached to '${existing.parent?.handlerName ?? 'nothing'}'`
      );
    }
    return this.attach(parent, childClass);
  }

  /**
   * Declare the wrapper of a class, replacing any earlier declaration.
   *
   * @param handlerClass - Declaring class
   * @param input - Template name, method reference, function, false, or null
   * @param conditions - Optional `only` / `except` action filters
   * @returns The normalized spec
   * @throws ConfigurationError if `input` is `true` or otherwise unusable
   */
  declare<H extends WrapperHost>(
    handlerClass: HandlerClass,
    input: WrapperInput<H>,
    conditions?: ConditionsInput | null
  ): WrapperSpec {
    const spec = toWrapperSpec(input);
    const normalized = normalizeConditions(conditions);
    const descriptor = this.descriptorFor(handlerClass);

    descriptor.replaceEntry({ spec, conditions: normalized });
    descriptor.plan();

    log.debug('Declared wrapper', {
      operation: 'declare',
      handler_class: descriptor.handlerName,
      spec: describeSpec(spec),
    });
    this.events.emitDeclared({
      handlerName: descriptor.handlerName,
      spec: describeSpec(spec),
      conditions: conditionsToJSON(normalized),
    });

    return spec;
  }

  /**
   * Layer additional literal wrappers on a class.
   *
   * Each call adds to the class's own layers (starting from the inherited
   * ones the first time), all sharing the given conditions.
   */
  layer(
    handlerClass: HandlerClass,
    names: readonly string[],
    conditions?: ConditionsInput | null
  ): void {
    for (const name of names) {
      if (typeof name !== 'string' || name.length === 0) {
        throw new ConfigurationError('Layered wrappers must be non-empty template names');
      }
    }

    const normalized = normalizeConditions(conditions);
    const descriptor = this.descriptorFor(handlerClass);
    descriptor.replaceLayers([
      ...descriptor.layers,
      ...names.map((name) => ({ name, conditions: normalized })),
    ]);
    descriptor.plan();

    log.debug('Layered wrappers', {
      operation: 'layer',
      handler_class: descriptor.handlerName,
      layers: names.join(','),
    });
    this.events.emitLayered({
      handlerName: descriptor.handlerName,
      layers: [...names],
      conditions: conditionsToJSON(normalized),
    });
  }

  /**
   * Get the resolution plan of a class.
   */
  planFor(handlerClass: HandlerClass): ResolutionPlan {
    return this.descriptorFor(handlerClass).plan();
  }

  /**
   * Check if a class has been seen by this registry.
   */
  isRegistered(handlerClass: HandlerClass): boolean {
    return this._descriptors.has(handlerClass);
  }

  /**
   * List the names of every known class.
   */
  listHandlers(): string[] {
    return Array.from(this._descriptors.values(), (descriptor) => descriptor.handlerName);
  }

  /**
   * Get the number of known classes.
   */
  handlerCount(): number {
    return this._descriptors.size;
  }

  /**
   * Forget every class.
   *
   * Primarily for testing.
   */
  clear(): void {
    this._descriptors.clear();
    log.debug('Cleared all handler descriptors', { operation: 'clear' });
  }

  /**
   * Get debug information about the registry.
   */
  debugInfo(): Record<string, unknown> {
    const handlers: Record<string, Record<string, unknown>> = {};
    for (const descriptor of this._descriptors.values()) {
      const { spec, conditions } = descriptor.entry;
      handlers[descriptor.handlerName] = {
        parent: descriptor.parent?.handlerName ?? null,
        spec: describeSpec(spec),
        inherited: !descriptor.declaresOwnWrapper,
        conditions: conditionsToJSON(conditions),
        layers: descriptor.layers.map((layer) => layer.name),
        layersInherited: !descriptor.declaresOwnLayers,
      };
    }

    return {
      wrapperRoot: this.wrapperRoot,
      handlerCount: this._descriptors.size,
      handlers,
      listeners: this.events.getListenerCounts(),
    };
  }

  private attach(parent: HandlerDescriptor | null, handlerClass: HandlerClass): HandlerDescriptor {
    const descriptor = new HandlerDescriptor(handlerClass, parent, this.wrapperRoot);
    this._descriptors.set(handlerClass, descriptor);
    parent?.children.add(descriptor);
    descriptor.plan();

    log.debug('Attached handler class', {
      operation: 'subclass',
      handler_class: descriptor.handlerName,
      parent_class: parent?.handlerName ?? null,
    });
    this.events.emitSubclassed({
      parentName: parent?.handlerName ?? null,
      handlerName: descriptor.handlerName,
    });

    return descriptor;
  }
}
