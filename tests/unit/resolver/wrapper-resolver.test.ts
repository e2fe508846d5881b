/**
 * WrapperResolver tests against an isolated registry.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { EventNames } from '../../../src/events/event-names.js';
import { RequestHandler } from '../../../src/handler/base.js';
import { InMemoryTemplateLookup } from '../../../src/lookup/sources/in-memory.js';
import {
  ConfigurationError,
  InvalidOverrideError,
  WrapperMethodError,
  WrapperNotFoundError,
} from '../../../src/registry/errors.js';
import { WrapperRegistry } from '../../../src/registry/wrapper-registry.js';
import { type RenderOptions, USE_DEFAULT_WRAPPER } from '../../../src/resolver/render-options.js';
import { WrapperResolver } from '../../../src/resolver/wrapper-resolver.js';
import { wrapperMethod } from '../../../src/types/wrapper-spec.js';

class ShopHandler extends RequestHandler {
  tier = 'basic';

  tierWrapper(): unknown {
    return this.tier === 'none' ? null : `shop_${this.tier}`;
  }

  countWrapper(): unknown {
    return 42;
  }
}

class CartHandler extends ShopHandler {}

describe('WrapperResolver', () => {
  let registry: WrapperRegistry;
  let lookup: InMemoryTemplateLookup;
  let resolver: WrapperResolver;

  beforeEach(() => {
    registry = new WrapperRegistry();
    lookup = new InMemoryTemplateLookup();
    resolver = new WrapperResolver({ lookup, registry });
  });

  describe('explain', () => {
    it('reports a literal declaration', () => {
      registry.declare(ShopHandler, 'shop');

      const trace = resolver.explain(new ShopHandler());

      expect(trace.result).toBe('wrapperss/shop');
      expect(trace.steps.map((step) => step.state)).toEqual([
        'Start',
        'CheckOverride',
        'CheckCondition',
        'EvaluateSpec',
        'ReturnLiteral',
        'Normalize',
        'End',
      ]);
      expect(trace.searchedPaths).toEqual([]);
    });

    it('reports the naming lookup and the delegation to the parent', () => {
      lookup.add('wrapperss/shop');

      const trace = resolver.explain(new CartHandler());

      expect(trace.result).toBe('wrapperss/shop');
      expect(trace.steps.map((step) => step.state)).toEqual([
        'Start',
        'CheckOverride',
        'CheckCondition',
        'EvaluateSpec',
        'FallThrough',
        'NamingLookup',
        'DelegateToAncestor',
        'CheckCondition',
        'EvaluateSpec',
        'FallThrough',
        'NamingLookup',
        'ReturnFound',
        'Normalize',
        'End',
      ]);
      expect(trace.steps[6]).toEqual({
        state: 'DelegateToAncestor',
        handler: 'CartHandler',
        detail: 'ShopHandler',
      });
      expect(trace.searchedPaths).toEqual(['wrapperss/cart', 'wrapperss/shop']);
    });

    it('reaches the root when nothing matches', () => {
      const trace = resolver.explain(new ShopHandler());

      expect(trace.result).toBe(false);
      expect(trace.steps.slice(-3)).toEqual([
        { state: 'FallThrough', handler: 'RequestHandler', detail: 'unset' },
        { state: 'ReachedRoot', handler: 'RequestHandler' },
        { state: 'End' },
      ]);
      expect(trace.searchedPaths).toEqual(['wrapperss/shop']);
    });

    it('reports skipped direct renders', () => {
      const trace = resolver.explain(new ShopHandler(), { text: 'ok' });

      expect(trace.result).toBe(false);
      expect(trace.steps.map((step) => step.state)).toEqual(['Start', 'Skipped', 'End']);
    });
  });

  describe('conditions', () => {
    beforeEach(() => {
      registry.declare(ShopHandler, 'shop', { only: ['index'] });
    });

    it('applies the declaration to listed actions', () => {
      expect(resolver.resolve(new ShopHandler('index'))).toBe('wrapperss/shop');
    });

    it('falls through for other actions', () => {
      const trace = resolver.explain(new ShopHandler('edit'));

      expect(trace.result).toBe(false);
      expect(trace.steps[3]).toEqual({ state: 'FallThrough', handler: 'ShopHandler', detail: 'inactive' });
    });

    it('applies to subclasses inheriting the declaration', () => {
      expect(resolver.resolve(new CartHandler('index'))).toBe('wrapperss/shop');
      expect(resolver.resolve(new CartHandler('edit'))).toBe(false);
    });

    it('finds the implied template for inactive actions', () => {
      lookup.add('wrapperss/cart');

      expect(resolver.resolve(new CartHandler('edit'))).toBe('wrapperss/cart');
    });
  });

  describe('dynamic specs', () => {
    it('calls the referenced method', () => {
      registry.declare(ShopHandler, wrapperMethod('tierWrapper'));
      const handler = new ShopHandler();
      handler.tier = 'gold';

      expect(resolver.resolve(handler)).toBe('wrapperss/shop_gold');
    });

    it('falls through when the method returns null', () => {
      registry.declare(ShopHandler, wrapperMethod('tierWrapper'));
      lookup.add('wrapperss/cart');
      const handler = new CartHandler();
      handler.tier = 'none';

      expect(resolver.resolve(handler)).toBe('wrapperss/cart');
    });

    it('raises when the method does not exist', () => {
      registry.declare(ShopHandler, wrapperMethod('missingWrapper'));

      expect(() => resolver.resolve(new ShopHandler())).toThrow(
        "Handler 'ShopHandler' does not have wrapper method 'missingWrapper'"
      );
    });

    it('passes the handler to inline functions', () => {
      registry.declare<ShopHandler>(ShopHandler, (handler: ShopHandler) => `tier_${handler.tier}`);

      expect(resolver.resolve(new CartHandler())).toBe('wrapperss/tier_basic');
    });

    it('binds zero-arity inline functions', () => {
      registry.declare<ShopHandler>(ShopHandler, function (this: ShopHandler) {
        return this.tier === 'basic' ? false : 'premium';
      });

      expect(resolver.resolve(new ShopHandler())).toBe(false);
    });

    it('rejects a method returning anything else', () => {
      registry.declare(ShopHandler, wrapperMethod('countWrapper'));

      expect(() => resolver.resolve(new ShopHandler())).toThrow(WrapperMethodError);
      expect(() => resolver.resolve(new ShopHandler())).toThrow(
        "Your wrapper method 'countWrapper' on 'ShopHandler' returned 42. It should have returned a string, false, or null"
      );
    });

    it('rejects an empty name', () => {
      registry.declare(ShopHandler, () => '');

      expect(() => resolver.resolve(new ShopHandler())).toThrow('Wrapper name must not be empty');
    });
  });

  describe('overrides', () => {
    beforeEach(() => {
      registry.declare(ShopHandler, 'shop', { only: 'index' });
    });

    it('wins over conditions', () => {
      expect(resolver.resolve(new ShopHandler('edit'), { wrapper: 'popup' })).toBe('wrapperss/popup');
    });

    it('keeps a prefixed override', () => {
      expect(resolver.resolve(new ShopHandler(), { wrapper: 'wrapperss/popup' })).toBe('wrapperss/popup');
    });

    it('uses the default for null and the marker', () => {
      expect(resolver.resolve(new ShopHandler(), { wrapper: null })).toBe('wrapperss/shop');
      expect(resolver.resolve(new ShopHandler(), { wrapper: USE_DEFAULT_WRAPPER })).toBe('wrapperss/shop');
    });

    it('uses the default when a function override returns null', () => {
      expect(resolver.resolve(new ShopHandler(), { wrapper: () => null })).toBe('wrapperss/shop');
    });

    it('evaluates function overrides against the handler', () => {
      const options: RenderOptions<ShopHandler> = { wrapper: (handler: ShopHandler) => handler.tier };

      expect(resolver.resolve(new ShopHandler(), options)).toBe('wrapperss/basic');
    });

    it('rejects anything else', () => {
      const options: RenderOptions = {};
      Object.assign(options, { wrapper: true });

      expect(() => resolver.resolve(new ShopHandler(), options)).toThrow(InvalidOverrideError);
      expect(() => resolver.resolve(new ShopHandler(), options)).toThrow(
        "String, function, false, or null expected for 'wrapper'; you passed true"
      );
    });

    it('applies even to direct renders', () => {
      expect(resolver.resolve(new ShopHandler(), { partial: 'row', wrapper: 'popup' })).toBe(
        'wrapperss/popup'
      );
    });
  });

  describe('actionHasWrapper', () => {
    it('renders bare when unset', () => {
      registry.declare(ShopHandler, 'shop');
      const handler = new ShopHandler();
      handler.actionHasWrapper = false;

      expect(resolver.resolve(handler)).toBe(false);
      expect(resolver.resolve(handler, { required: true })).toBe(false);
    });

    it('still honours an override', () => {
      const handler = new ShopHandler();
      handler.actionHasWrapper = false;

      expect(resolver.resolve(handler, { wrapper: 'popup' })).toBe('wrapperss/popup');
    });
  });

  describe('required', () => {
    it('lists the searched paths', () => {
      let caught: unknown;
      try {
        resolver.resolve(new CartHandler(), { required: true });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(WrapperNotFoundError);
      expect(caught instanceof WrapperNotFoundError && caught.searchedPaths).toEqual([
        'wrapperss/cart',
        'wrapperss/shop',
      ]);
    });

    it('raises for a suppressed wrapper', () => {
      registry.declare(ShopHandler, false);

      expect(() => resolver.resolve(new ShopHandler(), { required: true })).toThrow(
        'There was no default wrapper for ShopHandler in [none]'
      );
    });
  });

  describe('resolveStack', () => {
    it('replaces the whole stack with a call-site override', () => {
      registry.declare(ShopHandler, 'shop');
      registry.layer(ShopHandler, ['chrome']);

      expect(resolver.resolveStack(new ShopHandler('help'), { wrapper: 'help' })).toEqual(['wrapperss/help']);
    });

    it('keeps the layers when the override defers to the default', () => {
      registry.declare(ShopHandler, 'shop');
      registry.layer(ShopHandler, ['chrome']);

      expect(resolver.resolveStack(new ShopHandler(), { wrapper: USE_DEFAULT_WRAPPER })).toEqual([
        'wrapperss/shop',
        'wrapperss/chrome',
      ]);
      expect(resolver.resolveStack(new ShopHandler(), { wrapper: () => null })).toEqual([
        'wrapperss/shop',
        'wrapperss/chrome',
      ]);
    });

    it('returns nothing without a primary wrapper', () => {
      registry.declare(ShopHandler, false);
      registry.layer(ShopHandler, ['chrome']);

      expect(resolver.resolveStack(new ShopHandler())).toEqual([]);
    });

    it('keeps only the layers active for the action', () => {
      registry.declare(ShopHandler, 'shop');
      registry.layer(ShopHandler, ['chrome']);
      registry.layer(ShopHandler, ['receipt'], { except: ['index'] });

      expect(resolver.resolveStack(new ShopHandler('index'))).toEqual(['wrapperss/shop', 'wrapperss/chrome']);
      expect(resolver.resolveStack(new ShopHandler('show'))).toEqual([
        'wrapperss/shop',
        'wrapperss/chrome',
        'wrapperss/receipt',
      ]);
    });
  });

  describe('repeated resolution', () => {
    it('returns the same literal wrapper every time', () => {
      registry.declare(ShopHandler, 'shop');
      const handler = new ShopHandler('show');

      const first = resolver.explain(handler, { status: 200 });
      const second = resolver.explain(handler, { status: 200 });

      expect(first.result).toBe('wrapperss/shop');
      expect(second.result).toBe(first.result);
      expect(second.steps).toEqual(first.steps);
    });

    it('returns the same method wrapper every time', () => {
      registry.declare(ShopHandler, wrapperMethod('tierWrapper'));
      const handler = new CartHandler();
      handler.tier = 'gold';

      expect(resolver.resolve(handler)).toBe('wrapperss/shop_gold');
      expect(resolver.resolve(handler)).toBe('wrapperss/shop_gold');
    });

    it('repeats the naming lookup without accumulating searched paths', () => {
      lookup.add('wrapperss/shop');
      const handler = new CartHandler('index');

      const first = resolver.explain(handler);
      const second = resolver.explain(handler);

      expect(second.result).toBe('wrapperss/shop');
      expect(first.searchedPaths).toEqual(['wrapperss/cart', 'wrapperss/shop']);
      expect(second.searchedPaths).toEqual(['wrapperss/cart', 'wrapperss/shop']);
    });

    it('returns the same override result every time', () => {
      registry.declare(ShopHandler, 'shop');
      const handler = new ShopHandler();

      expect(resolver.resolve(handler, { wrapper: 'popup' })).toBe('wrapperss/popup');
      expect(resolver.resolve(handler, { wrapper: 'popup' })).toBe('wrapperss/popup');
    });
  });

  describe('empty names', () => {
    it('raises the same error with and without required', () => {
      registry.declare(ShopHandler, '');

      expect(() => resolver.resolve(new ShopHandler())).toThrow(ConfigurationError);
      expect(() => resolver.resolve(new ShopHandler(), { required: true })).toThrow(
        'Wrapper name must not be empty'
      );
      expect(() => resolver.resolve(new ShopHandler(), { required: true })).not.toThrow(WrapperNotFoundError);
    });
  });

  describe('normalizeRenderOptions', () => {
    it('replaces the wrapper option with the resolved identifier', () => {
      registry.declare(ShopHandler, 'shop');

      expect(resolver.normalizeRenderOptions(new ShopHandler(), { status: 200, required: false })).toEqual({
        status: 200,
        wrapper: 'wrapperss/shop',
      });
    });

    it('passes direct renders through', () => {
      registry.declare(ShopHandler, 'shop');

      expect(resolver.normalizeRenderOptions(new ShopHandler(), { partial: 'row' })).toEqual({ partial: 'row' });
    });
  });

  describe('custom root', () => {
    it('prefixes and searches under the configured root', () => {
      const layouts = new WrapperRegistry({ wrapperRoot: 'layouts' });
      const layoutResolver = new WrapperResolver({
        lookup: new InMemoryTemplateLookup(['layouts/cart']),
        registry: layouts,
      });

      expect(layoutResolver.resolve(new CartHandler())).toBe('layouts/cart');

      layouts.declare(ShopHandler, 'shop');
      expect(layoutResolver.resolve(new ShopHandler())).toBe('layouts/shop');
    });
  });

  describe('events', () => {
    it('emits a resolved event with the visited states', () => {
      const listener = vi.fn();
      registry.events.on(EventNames.WRAPPER_RESOLVED, listener);

      resolver.resolve(new ShopHandler('show'), { text: 'ok' });

      expect(listener).toHaveBeenCalledWith(
        expect.objectContaining({
          handlerName: 'ShopHandler',
          actionName: 'show',
          result: false,
          states: ['Start', 'Skipped', 'End'],
        })
      );
    });

    it('emits a failed event before rethrowing', () => {
      const listener = vi.fn();
      registry.events.on(EventNames.WRAPPER_FAILED, listener);

      expect(() => resolver.resolve(new ShopHandler(), { required: true })).toThrow(WrapperNotFoundError);
      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0]?.[0].error).toBeInstanceOf(WrapperNotFoundError);
    });
  });

  it('raises configuration errors as ConfigurationError', () => {
    registry.declare(ShopHandler, wrapperMethod('missingWrapper'));

    expect(() => resolver.resolve(new ShopHandler())).toThrow(ConfigurationError);
  });
});
