/**
 * Priority-ordered chain of template sources.
 *
 * Results from every source are concatenated in priority order, so the
 * first match comes from the highest-priority source that has one.
 *
 * @example
 * ```typescript
 * const chain = TemplateLookupChain.withSources([
 *   new InMemoryTemplateLookup(['wrapperss/application']),
 *   new FileSystemTemplateLookup({ viewPaths: ['app/views'] }),
 * ]);
 *
 * chain.findAll('posts', ['wrapperss'])[0]?.identifier;
 * ```
 */

import { createLogger } from '../logging/index.js';
import type { Template, TemplateLookup } from '../types/template.js';
import type { TemplateSource } from './base-source.js';

const log = createLogger({ component: 'lookup_chain' });

export class TemplateLookupChain implements TemplateLookup {
  private sources: TemplateSource[] = [];
  private sourcesByName: Map<string, TemplateSource> = new Map();

  /**
   * Create a chain with the given sources.
   */
  static withSources(sources: TemplateSource[]): TemplateLookupChain {
    const chain = new TemplateLookupChain();
    for (const source of sources) {
      chain.addSource(source);
    }
    return chain;
  }

  /**
   * Add a source to the chain.
   *
   * Sources are kept sorted by priority (lowest first). A source with the
   * same name as an existing one replaces it.
   */
  addSource(source: TemplateSource): void {
    const existing = this.sourcesByName.get(source.name);
    if (existing) {
      log.warn('Replacing template source', { operation: 'add_source', source: source.name });
      this.sources = this.sources.filter((candidate) => candidate !== existing);
    }
    this.sources.push(source);
    this.sourcesByName.set(source.name, source);
    this.sources.sort((a, b) => a.priority - b.priority);
  }

  /**
   * Get a source by name.
   */
  getSource(name: string): TemplateSource | undefined {
    return this.sourcesByName.get(name);
  }

  /**
   * List all sources with their priorities.
   *
   * @returns Array of [name, priority] tuples, sorted by priority
   */
  listSources(): Array<[string, number]> {
    return this.sources.map((source) => [source.name, source.priority]);
  }

  /**
   * Find templates in every source, deduplicated by identifier.
   */
  findAll(name: string, prefixes: readonly string[]): Template[] {
    const seen = new Set<string>();
    const results: Template[] = [];

    for (const source of this.sources) {
      for (const template of source.findAll(name, prefixes)) {
        if (!seen.has(template.identifier)) {
          seen.add(template.identifier);
          results.push(template);
        }
      }
    }

    return results;
  }
}
