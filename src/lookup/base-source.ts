/**
 * Template source interface for lookup chains.
 *
 * A source is a {@link TemplateLookup} with a name and a priority, so that
 * several of them can be combined in a {@link TemplateLookupChain}.
 *
 * @example
 * ```typescript
 * class ThemeSource implements TemplateSource {
 *   readonly name = 'theme';
 *   readonly priority = 20;
 *
 *   findAll(name: string, prefixes: readonly string[]): Template[] {
 *     return prefixes.includes('wrapperss') && name === 'dark'
 *       ? [{ identifier: 'wrapperss/dark' }]
 *       : [];
 *   }
 * }
 * ```
 */

import type { TemplateLookup } from '../types/template.js';

export interface TemplateSource extends TemplateLookup {
  /**
   * Unique name for this source.
   */
  readonly name: string;

  /**
   * Priority in the lookup chain.
   * Lower values are searched first.
   *
   * Suggested ranges:
   * - 1-20: In-memory and overriding sources
   * - 21-99: Application sources
   * - 100+: Filesystem sources
   */
  readonly priority: number;
}
