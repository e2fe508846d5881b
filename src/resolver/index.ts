/**
 * Wrapper resolution.
 */

export { type CreateWrapperResolverOptions, createWrapperResolver } from './factory.js';
export {
  DIRECT_RENDER_KEYS,
  includesWrapper,
  type RenderOptions,
  type ResolvedRenderOptions,
  USE_DEFAULT_WRAPPER,
  type WrapperOverride,
} from './render-options.js';
export {
  type ResolutionState,
  type ResolutionStep,
  type ResolutionTrace,
  WrapperResolver,
  type WrapperResolverOptions,
} from './wrapper-resolver.js';
