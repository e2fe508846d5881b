/**
 * Type-safe event emitter for wrapper events.
 */

import { EventEmitter } from 'eventemitter3';
import type { WrapperResult } from '../types/wrapper-spec.js';
import { EventNames } from './event-names.js';

/**
 * Event payload types
 */
export interface WrapperDeclaredPayload {
  handlerName: string;
  spec: string;
  conditions: { only?: string[]; except?: string[] };
  timestamp: Date;
}

export interface WrapperLayeredPayload {
  handlerName: string;
  layers: string[];
  conditions: { only?: string[]; except?: string[] };
  timestamp: Date;
}

export interface WrapperSubclassedPayload {
  parentName: string | null;
  handlerName: string;
  timestamp: Date;
}

export interface WrapperResolvedPayload {
  handlerName: string;
  actionName: string;
  result: WrapperResult;
  states: string[];
  timestamp: Date;
}

export interface WrapperFailedPayload {
  handlerName: string;
  actionName: string;
  error: Error;
  timestamp: Date;
}

/**
 * Event map for type-safe event handling
 */
export interface WrapperEventMap {
  'wrapper.declared': [WrapperDeclaredPayload];
  'wrapper.layered': [WrapperLayeredPayload];
  'wrapper.subclassed': [WrapperSubclassedPayload];
  'wrapper.resolved': [WrapperResolvedPayload];
  'wrapper.failed': [WrapperFailedPayload];
}

/**
 * Type-safe event emitter for wrapper events
 */
export class WrapperEventEmitter extends EventEmitter<WrapperEventMap> {
  /**
   * Emit a wrapper declared event
   */
  emitDeclared(payload: Omit<WrapperDeclaredPayload, 'timestamp'>): void {
    this.emit(EventNames.WRAPPER_DECLARED, { ...payload, timestamp: new Date() });
  }

  /**
   * Emit a wrapper layered event
   */
  emitLayered(payload: Omit<WrapperLayeredPayload, 'timestamp'>): void {
    this.emit(EventNames.WRAPPER_LAYERED, { ...payload, timestamp: new Date() });
  }

  /**
   * Emit a subclass attached event
   */
  emitSubclassed(payload: Omit<WrapperSubclassedPayload, 'timestamp'>): void {
    this.emit(EventNames.WRAPPER_SUBCLASSED, { ...payload, timestamp: new Date() });
  }

  /**
   * Emit a wrapper resolved event
   */
  emitResolved(payload: Omit<WrapperResolvedPayload, 'timestamp'>): void {
    this.emit(EventNames.WRAPPER_RESOLVED, { ...payload, timestamp: new Date() });
  }

  /**
   * Emit a wrapper resolution failed event
   */
  emitFailed(payload: Omit<WrapperFailedPayload, 'timestamp'>): void {
    this.emit(EventNames.WRAPPER_FAILED, { ...payload, timestamp: new Date() });
  }

  /**
   * Get listener counts for every known event, for debugging.
   */
  getListenerCounts(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const name of Object.values(EventNames)) {
      counts[name] = this.listenerCount(name);
    }
    return counts;
  }
}
