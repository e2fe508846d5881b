/**
 * Handler descriptors: the registry's explicit model of the class hierarchy.
 *
 * Each handler class gets one descriptor holding its own declaration (if
 * any) and a pointer to its parent's descriptor. Classes without their own
 * declaration read their parent's, so redeclaring on a parent is visible to
 * every descendant that has not declared for itself.
 */

import { type Conditions, NO_CONDITIONS } from '../types/conditions.js';
import type { HandlerClass } from '../types/handler.js';
import { UNSET, type WrapperSpec } from '../types/wrapper-spec.js';
import { impliedWrapperName, wrapperPrefixes } from './naming.js';

/**
 * A declared wrapper together with the conditions it was declared with.
 */
export interface WrapperEntry {
  readonly spec: WrapperSpec;
  readonly conditions: Conditions;
}

/**
 * An additional literal wrapper layered on top of the primary one.
 */
export interface WrapperLayer {
  readonly name: string;
  readonly conditions: Conditions;
}

/**
 * Everything the resolver needs to resolve for one class, computed once
 * per declaration change.
 */
export interface ResolutionPlan {
  readonly handlerClass: HandlerClass;
  readonly handlerName: string;
  /** Name derived from the class, or null when the class has no conventional wrapper */
  readonly impliedName: string | null;
  readonly prefixes: readonly string[];
  readonly spec: WrapperSpec;
  readonly conditions: Conditions;
  readonly layers: readonly WrapperLayer[];
  readonly parent: HandlerDescriptor | null;
}

const DEFAULT_ENTRY: WrapperEntry = Object.freeze({ spec: UNSET, conditions: NO_CONDITIONS });

export class HandlerDescriptor {
  readonly handlerClass: HandlerClass;
  readonly parent: HandlerDescriptor | null;
  readonly children: Set<HandlerDescriptor> = new Set();
  readonly wrapperRoot: string;

  private ownEntry: WrapperEntry | null = null;
  private ownLayers: readonly WrapperLayer[] | null = null;
  private cachedPlan: ResolutionPlan | null = null;

  constructor(handlerClass: HandlerClass, parent: HandlerDescriptor | null, wrapperRoot: string) {
    this.handlerClass = handlerClass;
    this.parent = parent;
    this.wrapperRoot = wrapperRoot;
  }

  /**
   * Display name of the class.
   */
  get handlerName(): string {
    return this.handlerClass.name || '(anonymous)';
  }

  /**
   * The effective entry: own if declared, else the nearest ancestor's.
   */
  get entry(): WrapperEntry {
    return this.ownEntry ?? this.parent?.entry ?? DEFAULT_ENTRY;
  }

  /**
   * The effective layers: own if declared, else the nearest ancestor's.
   */
  get layers(): readonly WrapperLayer[] {
    return this.ownLayers ?? this.parent?.layers ?? [];
  }

  get declaresOwnWrapper(): boolean {
    return this.ownEntry !== null;
  }

  get declaresOwnLayers(): boolean {
    return this.ownLayers !== null;
  }

  replaceEntry(entry: WrapperEntry): void {
    this.ownEntry = Object.freeze({ ...entry });
    this.invalidate();
  }

  replaceLayers(layers: readonly WrapperLayer[]): void {
    this.ownLayers = Object.freeze([...layers]);
    this.invalidate();
  }

  /**
   * Drop the cached plan of this descriptor and every descendant.
   */
  invalidate(): void {
    this.cachedPlan = null;
    for (const child of this.children) {
      child.invalidate();
    }
  }

  /**
   * Get the resolution plan, building it on first use.
   */
  plan(): ResolutionPlan {
    if (this.cachedPlan) {
      return this.cachedPlan;
    }

    const impliedName = impliedWrapperName(this.handlerClass);
    const { spec, conditions } = this.entry;
    const plan: ResolutionPlan = Object.freeze({
      handlerClass: this.handlerClass,
      handlerName: this.handlerName,
      impliedName,
      prefixes: impliedName === null ? [] : wrapperPrefixes(impliedName, this.wrapperRoot),
      spec,
      conditions,
      layers: this.layers,
      parent: this.parent,
    });

    this.cachedPlan = plan;
    return plan;
  }

  /**
   * Ancestor chain starting with this descriptor.
   */
  lineage(): HandlerDescriptor[] {
    const chain: HandlerDescriptor[] = [];
    let current: HandlerDescriptor | null = this;
    while (current) {
      chain.push(current);
      current = current.parent;
    }
    return chain;
  }
}
