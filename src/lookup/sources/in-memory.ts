/**
 * In-memory template source (priority 10).
 *
 * Holds a set of virtual paths. Useful for tests, and for applications
 * that register wrappers programmatically.
 */

import { type Template, virtualPath } from '../../types/template.js';
import type { TemplateSource } from '../base-source.js';

export class InMemoryTemplateLookup implements TemplateSource {
  readonly name = 'in_memory';
  readonly priority = 10;

  private templates: Map<string, Template> = new Map();

  constructor(identifiers: Iterable<string> = []) {
    for (const identifier of identifiers) {
      this.add(identifier);
    }
  }

  /**
   * Register a template under its virtual path.
   */
  add(identifier: string, path?: string): void {
    const template: Template = path === undefined ? { identifier } : { identifier, path };
    this.templates.set(identifier, template);
  }

  remove(identifier: string): boolean {
    return this.templates.delete(identifier);
  }

  has(identifier: string): boolean {
    return this.templates.has(identifier);
  }

  list(): string[] {
    return [...this.templates.keys()];
  }

  findAll(name: string, prefixes: readonly string[]): Template[] {
    const candidates = prefixes.length === 0 ? [name] : prefixes.map((prefix) => virtualPath(prefix, name));
    const found: Template[] = [];
    for (const candidate of candidates) {
      const template = this.templates.get(candidate);
      if (template) {
        found.push(template);
      }
    }
    return found;
  }
}
