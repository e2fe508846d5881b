/**
 * Template collaborator contract.
 *
 * The wrapper machinery never parses or renders templates. It only asks a
 * lookup whether a template exists under a name and a list of prefixes, and
 * takes the first match.
 */

/**
 * A template located by a lookup.
 */
export interface Template {
  /** Virtual path, e.g. "wrapperss/weblog/posts". Used as the wrapper identifier. */
  readonly identifier: string;

  /** Where the template lives, when it comes from disk. */
  readonly path?: string;
}

/**
 * Anything that can find templates.
 */
export interface TemplateLookup {
  /**
   * Find every template called `name` under any of `prefixes`, in prefix
   * order. An empty prefix list means `name` is already a full virtual path.
   */
  findAll(name: string, prefixes: readonly string[]): Template[];
}

/**
 * Join a prefix and a name into a virtual path.
 */
export function virtualPath(prefix: string, name: string): string {
  if (prefix.length === 0) {
    return name;
  }
  return `${prefix.replace(/\/+$/, '')}/${name.replace(/^\/+/, '')}`;
}
