/**
 * Filesystem template source (priority 100).
 *
 * Searches a list of view directories. `findAll('posts', ['wrapperss'])`
 * matches `<viewPath>/wrapperss/posts` with any extension, e.g.
 * `posts.html.ejs`. View paths are searched in order.
 */

import { existsSync, readdirSync, statSync } from 'node:fs';
import { basename, dirname, join, resolve, sep } from 'node:path';
import { createLogger } from '../../logging/index.js';
import { type Template, virtualPath } from '../../types/template.js';
import type { TemplateSource } from '../base-source.js';

const log = createLogger({ component: 'file_system_lookup' });

export interface FileSystemTemplateLookupOptions {
  /** View directories, searched in order */
  viewPaths: readonly string[];

  /** Restrict matches to these extensions (e.g. [".html.ejs"]); any extension when omitted */
  extensions?: readonly string[];
}

export class FileSystemTemplateLookup implements TemplateSource {
  readonly name = 'file_system';
  readonly priority = 100;

  readonly viewPaths: readonly string[];
  private readonly extensions: readonly string[] | null;

  constructor(options: FileSystemTemplateLookupOptions) {
    this.viewPaths = options.viewPaths.map((viewPath) => resolve(viewPath));
    this.extensions = options.extensions ?? null;
  }

  findAll(name: string, prefixes: readonly string[]): Template[] {
    const candidates = prefixes.length === 0 ? [name] : prefixes.map((prefix) => virtualPath(prefix, name));
    const found: Template[] = [];

    for (const viewPath of this.viewPaths) {
      for (const candidate of candidates) {
        const path = this.findFile(viewPath, candidate);
        if (path) {
          found.push({ identifier: candidate, path });
        }
      }
    }

    return found;
  }

  private findFile(viewPath: string, candidate: string): string | null {
    const target = join(viewPath, candidate);
    // Virtual paths must stay inside the view directory
    if (!target.startsWith(`${viewPath}${sep}`)) {
      return null;
    }

    const directory = dirname(target);
    if (!existsSync(directory)) {
      return null;
    }

    const stem = basename(target);
    let entries: string[];
    try {
      entries = readdirSync(directory).sort();
    } catch (error) {
      log.warn('Unable to read view directory', {
        operation: 'find_all',
        directory,
        error_message: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    for (const entry of entries) {
      if (!this.matches(entry, stem)) {
        continue;
      }
      const path = join(directory, entry);
      // Dangling links and entries removed since the listing are skipped
      if (statSync(path, { throwIfNoEntry: false })?.isFile()) {
        return path;
      }
    }
    return null;
  }

  private matches(entry: string, stem: string): boolean {
    if (!entry.startsWith(`${stem}.`)) {
      return false;
    }
    if (!this.extensions) {
      return true;
    }
    const extension = entry.slice(stem.length);
    return this.extensions.includes(extension);
  }
}
