/**
 * Resolver construction from configuration.
 */

import { loadConfig } from '../config/load-config.js';
import type { WrappersConfig, WrappersConfigOverrides } from '../config/types.js';
import type { TemplateSource } from '../lookup/base-source.js';
import { setLogLevel } from '../logging/index.js';
import { TemplateLookupChain } from '../lookup/lookup-chain.js';
import { FileSystemTemplateLookup } from '../lookup/sources/file-system.js';
import { ConfigurationError } from '../registry/errors.js';
import { WrapperRegistry } from '../registry/wrapper-registry.js';
import { WrapperResolver } from './wrapper-resolver.js';

export interface CreateWrapperResolverOptions {
  /** Configuration overrides applied on top of the environment */
  config?: WrappersConfigOverrides;

  /** Registry to resolve against (default: the shared instance) */
  registry?: WrapperRegistry;

  /** Extra template sources, searched by priority alongside the view paths */
  sources?: TemplateSource[];
}

/**
 * Build a resolver whose lookup searches the configured view paths plus
 * any extra sources. The configured log level is applied to the shared
 * root logger.
 *
 * @throws ConfigurationError if the configured wrapper root differs from
 *         the registry's
 *
 * @example
 * ```typescript
 * const resolver = createWrapperResolver({ config: { viewPaths: ['app/views'] } });
 * ```
 */
export function createWrapperResolver(options: CreateWrapperResolverOptions = {}): WrapperResolver {
  const config: WrappersConfig = loadConfig(process.env, options.config);
  const registry = options.registry ?? WrapperRegistry.instance();

  if (registry.wrapperRoot !== config.wrapperRoot) {
    throw new ConfigurationError(
      `Configured wrapper root '${config.wrapperRoot}' does not match the registry's '${registry.wrapperRoot}'`
    );
  }

  setLogLevel(config.logLevel);

  const lookup = TemplateLookupChain.withSources([
    ...(options.sources ?? []),
    new FileSystemTemplateLookup({ viewPaths: config.viewPaths }),
  ]);

  return new WrapperResolver({ lookup, registry });
}
