/**
 * Wrapper resolution.
 *
 * Computes, for a handler instance and its current action, which template
 * (if any) wraps the response:
 *
 * 1. Direct renders (`text`, `inline`, `partial`, `body`) without a
 *    `wrapper` override skip resolution.
 * 2. A call-site override wins over everything the class declares.
 * 3. With `actionHasWrapper` false the action renders bare.
 * 4. Otherwise the class's plan is evaluated: conditions first, then the
 *    declared spec. Unset specs, inactive conditions and dynamic specs that
 *    return null fall through to the naming convention, then to the parent
 *    class, up to the root.
 * 5. Any string produced is prefixed with the wrapper root.
 *
 * @example
 * ```typescript
 * const resolver = new WrapperResolver({
 *   lookup: new InMemoryTemplateLookup(['wrapperss/bank']),
 * });
 *
 * resolver.resolve(new CurrencyHandler('index'));                   // 'wrapperss/bank'
 * resolver.resolve(new CurrencyHandler('index'), { wrapper: 'x' }); // 'wrapperss/x'
 * resolver.resolve(new CurrencyHandler('index'), { partial: 'row' }); // false
 * ```
 */

import type { WrapperEventEmitter } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import {
  ConfigurationError,
  InvalidOverrideError,
  WrapperMethodError,
  WrapperNotFoundError,
} from '../registry/errors.js';
import type { HandlerDescriptor } from '../registry/handler-descriptor.js';
import { normalizeWrapper } from '../registry/naming.js';
import { WrapperRegistry } from '../registry/wrapper-registry.js';
import { isConditionallyActive } from '../types/conditions.js';
import type { WrapperHost } from '../types/handler.js';
import { type TemplateLookup, virtualPath } from '../types/template.js';
import type { InlineWrapperFn, WrapperResult } from '../types/wrapper-spec.js';
import {
  includesWrapper,
  type RenderOptions,
  type ResolvedRenderOptions,
  USE_DEFAULT_WRAPPER,
} from './render-options.js';

const log = createLogger({ component: 'wrapper_resolver' });

const INLINE_METHOD_NAME = '(inline)';

/**
 * States visited while resolving.
 */
export type ResolutionState =
  | 'Start'
  | 'Skipped'
  | 'CheckOverride'
  | 'ReturnOverride'
  | 'ActionWithoutWrapper'
  | 'CheckCondition'
  | 'EvaluateSpec'
  | 'ReturnLiteral'
  | 'ReturnDynamic'
  | 'ReturnSuppressed'
  | 'FallThrough'
  | 'NamingLookup'
  | 'ReturnFound'
  | 'DelegateToAncestor'
  | 'ReachedRoot'
  | 'Fail'
  | 'Normalize'
  | 'End';

export interface ResolutionStep {
  readonly state: ResolutionState;
  /** Class whose plan was being evaluated, when relevant */
  readonly handler?: string;
  readonly detail?: string;
}

/**
 * Result of a resolution together with the path taken.
 */
export interface ResolutionTrace {
  readonly result: WrapperResult;
  readonly steps: readonly ResolutionStep[];
  /** Virtual paths tried by the naming convention, in order */
  readonly searchedPaths: readonly string[];
}

export interface WrapperResolverOptions {
  /** Template collaborator used by the naming convention */
  lookup: TemplateLookup;

  /** Registry holding the declarations (default: the shared instance) */
  registry?: WrapperRegistry;

  /** Emitter for resolution events (default: the registry's) */
  events?: WrapperEventEmitter;
}

/**
 * Mutable state of a single resolution.
 */
class ResolutionContext {
  readonly steps: ResolutionStep[] = [];
  readonly searchedPaths: string[] = [];

  constructor(readonly handler: WrapperHost) {}

  record(state: ResolutionState, handler?: string, detail?: string): void {
    const step: { state: ResolutionState; handler?: string; detail?: string } = { state };
    if (handler !== undefined) {
      step.handler = handler;
    }
    if (detail !== undefined) {
      step.detail = detail;
    }
    this.steps.push(step);
  }
}

/**
 * Intermediate value: a template name, false for "no wrapper", or null
 * for "nothing found".
 */
type Resolved = string | false | null;

export class WrapperResolver {
  readonly registry: WrapperRegistry;
  readonly lookup: TemplateLookup;
  readonly events: WrapperEventEmitter;

  constructor(options: WrapperResolverOptions) {
    this.registry = options.registry ?? WrapperRegistry.instance();
    this.lookup = options.lookup;
    this.events = options.events ?? this.registry.events;
  }

  /**
   * Resolve the wrapper for a handler's current action.
   *
   * @returns Normalized template identifier, or false for no wrapper
   * @throws ConfigurationError for invalid overrides or dynamic spec results
   * @throws WrapperNotFoundError when `required` is set and nothing resolves
   */
  resolve<H extends WrapperHost>(handler: H, options: RenderOptions<H> = {}): WrapperResult {
    return this.explain(handler, options).result;
  }

  /**
   * Resolve and report every state visited on the way.
   */
  explain<H extends WrapperHost>(handler: H, options: RenderOptions<H> = {}): ResolutionTrace {
    const context = new ResolutionContext(handler);
    const handlerName = handler.handlerClass.name || '(anonymous)';
    context.record('Start', handlerName);

    try {
      const result = this.run(context, options);
      context.record('End');

      log.trace('Resolved wrapper', {
        operation: 'resolve',
        handler_class: handlerName,
        action: handler.actionName,
        wrapper: result === false ? null : result,
      });
      this.events.emitResolved({
        handlerName,
        actionName: handler.actionName,
        result,
        states: context.steps.map((step) => step.state),
      });

      return { result, steps: context.steps, searchedPaths: context.searchedPaths };
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      log.warn('Wrapper resolution failed', {
        operation: 'resolve',
        handler_class: handlerName,
        action: handler.actionName,
        error_message: failure.message,
      });
      this.events.emitFailed({ handlerName, actionName: handler.actionName, error: failure });
      throw error;
    }
  }

  /**
   * Resolve the primary wrapper followed by every active layer.
   *
   * Layers wrap the primary wrapper, so the list is ordered innermost
   * first. No primary wrapper means no layers either, and a call-site
   * override replaces the whole stack.
   */
  resolveStack<H extends WrapperHost>(handler: H, options: RenderOptions<H> = {}): string[] {
    const { result: primary, steps } = this.explain(handler, options);
    if (primary === false) {
      return [];
    }
    if (steps.some((step) => step.state === 'ReturnOverride')) {
      return [primary];
    }

    const plan = this.registry.planFor(handler.handlerClass);
    const layers = plan.layers
      .filter((layer) => isConditionallyActive(layer.conditions, handler.actionName))
      .map((layer) => normalizeWrapper(layer.name, this.registry.wrapperRoot));

    return [primary, ...layers];
  }

  /**
   * Replace the `wrapper` option of a render call with the resolved
   * identifier. Direct renders without an override pass through untouched.
   */
  normalizeRenderOptions<H extends WrapperHost>(
    handler: H,
    options: RenderOptions<H>
  ): ResolvedRenderOptions {
    const { wrapper, required, ...rest } = options;
    if (!includesWrapper(options)) {
      return rest;
    }
    return { ...rest, wrapper: this.resolve(handler, options) };
  }

  private run(context: ResolutionContext, options: RenderOptions): WrapperResult {
    if (!includesWrapper(options)) {
      context.record('Skipped');
      return false;
    }

    context.record('CheckOverride');
    const override = options.wrapper;
    if (override !== undefined && override !== null && override !== USE_DEFAULT_WRAPPER) {
      const value = this.evaluateOverride(context, override);
      if (value !== null) {
        context.record('ReturnOverride');
        return this.normalize(context, value);
      }
    }

    return this.resolveDefault(context, options.required === true);
  }

  private evaluateOverride(context: ResolutionContext, override: unknown): Resolved {
    if (typeof override === 'string') {
      return override;
    }
    if (override === false) {
      return false;
    }
    if (typeof override === 'function') {
      const value: unknown =
        override.length === 0
          ? Reflect.apply(override, context.handler, [])
          : Reflect.apply(override, context.handler, [context.handler]);
      return this.checkDynamic(context, INLINE_METHOD_NAME, value);
    }
    throw new InvalidOverrideError(override);
  }

  private resolveDefault(context: ResolutionContext, required: boolean): WrapperResult {
    const { handler } = context;
    if (!handler.actionHasWrapper) {
      context.record('ActionWithoutWrapper');
      return false;
    }

    const descriptor = this.registry.descriptorFor(handler.handlerClass);
    const value = this.evaluate(context, descriptor);

    if (value === '') {
      context.record('Fail', descriptor.handlerName, 'empty');
      throw new ConfigurationError('Wrapper name must not be empty');
    }
    if (required && !value) {
      context.record('Fail', descriptor.handlerName, 'required');
      throw new WrapperNotFoundError(descriptor.handlerName, [...context.searchedPaths]);
    }

    return value === null ? false : this.normalize(context, value);
  }

  /**
   * Evaluate one class's plan against the handler instance.
   */
  private evaluate(context: ResolutionContext, descriptor: HandlerDescriptor): Resolved {
    const plan = descriptor.plan();
    const { handler } = context;

    context.record('CheckCondition', plan.handlerName);
    if (!isConditionallyActive(plan.conditions, handler.actionName)) {
      context.record('FallThrough', plan.handlerName, 'inactive');
      return this.implied(context, descriptor);
    }

    context.record('EvaluateSpec', plan.handlerName, plan.spec.kind);
    const { spec } = plan;
    switch (spec.kind) {
      case 'literal':
        context.record('ReturnLiteral', plan.handlerName);
        return spec.name;

      case 'suppressed':
        context.record('ReturnSuppressed', plan.handlerName);
        return false;

      case 'unset':
        context.record('FallThrough', plan.handlerName, 'unset');
        return this.implied(context, descriptor);

      case 'method': {
        const method = handler.wrapperMethod(spec.name);
        if (!method) {
          context.record('Fail', plan.handlerName, spec.name);
          throw new WrapperMethodError(plan.handlerName, spec.name, undefined, true);
        }
        return this.dynamicOrImplied(context, descriptor, spec.name, method());
      }

      case 'inline':
        return this.dynamicOrImplied(
          context,
          descriptor,
          INLINE_METHOD_NAME,
          this.callInline(spec.fn, handler)
        );
    }
  }

  private callInline(fn: InlineWrapperFn, handler: WrapperHost): unknown {
    // Zero-arity functions only see the handler as `this`
    return fn.length === 0 ? Reflect.apply(fn, handler, []) : fn.call(handler, handler);
  }

  private dynamicOrImplied(
    context: ResolutionContext,
    descriptor: HandlerDescriptor,
    methodName: string,
    value: unknown
  ): Resolved {
    const checked = this.checkDynamic(context, methodName, value, descriptor.handlerName);
    if (checked === null) {
      context.record('FallThrough', descriptor.handlerName, 'null');
      return this.implied(context, descriptor);
    }
    if (checked === false) {
      context.record('ReturnSuppressed', descriptor.handlerName);
    } else {
      context.record('ReturnDynamic', descriptor.handlerName);
    }
    return checked;
  }

  private checkDynamic(
    context: ResolutionContext,
    methodName: string,
    value: unknown,
    handlerName = context.handler.handlerClass.name
  ): Resolved {
    if (value === null || value === undefined) {
      return null;
    }
    if (typeof value === 'string' || value === false) {
      return value;
    }
    context.record('Fail', handlerName, methodName);
    throw new WrapperMethodError(handlerName, methodName, value);
  }

  /**
   * Naming convention for the class, then the parent's plan.
   */
  private implied(context: ResolutionContext, descriptor: HandlerDescriptor): Resolved {
    const plan = descriptor.plan();

    if (plan.impliedName !== null) {
      context.record('NamingLookup', plan.handlerName, plan.impliedName);
      const candidates =
        plan.prefixes.length === 0
          ? [plan.impliedName]
          : plan.prefixes.map((prefix) => virtualPath(prefix, plan.impliedName ?? ''));
      context.searchedPaths.push(...candidates);

      const template = this.lookup.findAll(plan.impliedName, plan.prefixes)[0];
      if (template) {
        context.record('ReturnFound', plan.handlerName, template.identifier);
        return template.identifier;
      }
    }

    if (!plan.parent) {
      context.record('ReachedRoot', plan.handlerName);
      return null;
    }

    context.record('DelegateToAncestor', plan.handlerName, plan.parent.handlerName);
    return this.evaluate(context, plan.parent);
  }

  private normalize(context: ResolutionContext, value: string | false): WrapperResult {
    if (value === false) {
      return false;
    }
    if (value.length === 0) {
      throw new ConfigurationError('Wrapper name must not be empty');
    }
    context.record('Normalize', undefined, value);
    return normalizeWrapper(value, this.registry.wrapperRoot);
  }
}
