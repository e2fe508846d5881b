/**
 * Render options as handed over by the rendering pipeline.
 */

import type { WrapperHost } from '../types/handler.js';
import type { InlineWrapperFn, WrapperResult } from '../types/wrapper-spec.js';

/**
 * Marker meaning "use whatever the handler class declares". Equivalent to
 * leaving `wrapper` out or passing null.
 */
export const USE_DEFAULT_WRAPPER: unique symbol = Symbol('handler-wrappers.useDefault');

/**
 * Per-render override of the declared wrapper.
 */
export type WrapperOverride<H extends WrapperHost = WrapperHost> =
  | string
  | InlineWrapperFn<H>
  | false
  | null
  | typeof USE_DEFAULT_WRAPPER;

/**
 * Keys that render content directly. Their presence skips wrapper
 * resolution unless a `wrapper` override is given as well.
 */
export const DIRECT_RENDER_KEYS = ['text', 'inline', 'partial', 'body'] as const;

export interface RenderOptions<H extends WrapperHost = WrapperHost> {
  /** Call-site override; wins over the class declaration and its conditions */
  wrapper?: WrapperOverride<H>;

  /** Raise WrapperNotFoundError instead of rendering bare when nothing resolves */
  required?: boolean;

  text?: unknown;
  inline?: unknown;
  partial?: unknown;
  body?: unknown;

  [key: string]: unknown;
}

/**
 * Options after normalization: `wrapper` holds the resolved identifier.
 */
export interface ResolvedRenderOptions {
  wrapper?: WrapperResult;
  [key: string]: unknown;
}

/**
 * Check whether a render call takes part in wrapper resolution at all.
 */
export function includesWrapper(options: RenderOptions): boolean {
  if (options.wrapper !== undefined) {
    return true;
  }
  return !DIRECT_RENDER_KEYS.some((key) => options[key] !== undefined);
}
