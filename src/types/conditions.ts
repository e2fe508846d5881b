/**
 * Action conditions for wrapper declarations.
 *
 * `only` restricts a wrapper to the listed actions; `except` applies it to
 * every action but the listed ones. When both are given, `only` wins.
 *
 * @example
 * ```typescript
 * class WeblogHandler extends RequestHandler {
 *   static {
 *     this.wrapper('weblog_standard', { except: 'rss' });
 *   }
 * }
 * ```
 */

/**
 * Conditions as written by a handler author. Scalars are wrapped into a
 * single-element list.
 */
export interface ConditionsInput {
  only?: string | readonly string[];
  except?: string | readonly string[];
}

/**
 * Normalized conditions.
 */
export interface Conditions {
  readonly only?: ReadonlySet<string>;
  readonly except?: ReadonlySet<string>;
}

export const NO_CONDITIONS: Conditions = Object.freeze({});

function toActionSet(value: string | readonly string[]): ReadonlySet<string> {
  const list = typeof value === 'string' ? [value] : value;
  return new Set(list.map((action) => String(action)));
}

/**
 * Normalize condition input into frozen action sets.
 *
 * Keys other than `only` and `except` are ignored.
 */
export function normalizeConditions(input?: ConditionsInput | null): Conditions {
  if (!input) {
    return NO_CONDITIONS;
  }

  const conditions: { only?: ReadonlySet<string>; except?: ReadonlySet<string> } = {};
  if (input.only !== undefined) {
    conditions.only = toActionSet(input.only);
  }
  if (input.except !== undefined) {
    conditions.except = toActionSet(input.except);
  }

  if (!conditions.only && !conditions.except) {
    return NO_CONDITIONS;
  }
  return Object.freeze(conditions);
}

/**
 * Check whether the wrapper is active for an action.
 *
 * Without conditions every action is active.
 */
export function isConditionallyActive(conditions: Conditions, actionName: string): boolean {
  if (conditions.only) {
    return conditions.only.has(actionName);
  }
  if (conditions.except) {
    return !conditions.except.has(actionName);
  }
  return true;
}

export function hasConditions(conditions: Conditions): boolean {
  return conditions.only !== undefined || conditions.except !== undefined;
}

/**
 * Plain-object form for logs and debug output.
 */
export function conditionsToJSON(conditions: Conditions): { only?: string[]; except?: string[] } {
  const json: { only?: string[]; except?: string[] } = {};
  if (conditions.only) {
    json.only = [...conditions.only];
  }
  if (conditions.except) {
    json.except = [...conditions.except];
  }
  return json;
}
