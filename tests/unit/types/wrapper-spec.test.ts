/**
 * Wrapper spec normalization tests.
 */

import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../../src/registry/errors.js';
import {
  describeSpec,
  SUPPRESSED,
  toWrapperSpec,
  UNSET,
  wrapperMethod,
} from '../../../src/types/wrapper-spec.js';

describe('toWrapperSpec', () => {
  it('turns a string into a literal spec', () => {
    expect(toWrapperSpec('weblog_standard')).toEqual({ kind: 'literal', name: 'weblog_standard' });
  });

  it('turns a method reference into a method spec', () => {
    expect(toWrapperSpec(wrapperMethod('pick'))).toEqual({ kind: 'method', name: 'pick' });
  });

  it('turns a symbol into a method spec keyed by its description', () => {
    expect(toWrapperSpec(Symbol('pick'))).toEqual({ kind: 'method', name: 'pick' });
  });

  it('rejects a symbol without a description', () => {
    expect(() => toWrapperSpec(Symbol())).toThrow('Wrapper method name must be a non-empty string');
  });

  it('turns a function into an inline spec', () => {
    const fn = () => 'dynamic';
    const spec = toWrapperSpec(fn);

    expect(spec.kind).toBe('inline');
    expect(spec.kind === 'inline' && spec.fn).toBe(fn);
  });

  it('turns false into the suppressed spec', () => {
    expect(toWrapperSpec(false)).toBe(SUPPRESSED);
  });

  it('turns null and undefined into the unset spec', () => {
    expect(toWrapperSpec(null)).toBe(UNSET);
    expect(toWrapperSpec(undefined)).toBe(UNSET);
  });

  it('rejects true', () => {
    expect(() => toWrapperSpec(true)).toThrow(ConfigurationError);
    expect(() => toWrapperSpec(true)).toThrow(
      'Wrappers must be specified as strings, method references, functions, false, or null'
    );
  });

  it('returns frozen specs', () => {
    expect(Object.isFrozen(toWrapperSpec('weblog'))).toBe(true);
  });
});

describe('wrapperMethod', () => {
  it('rejects an empty name', () => {
    expect(() => wrapperMethod('')).toThrow(ConfigurationError);
  });
});

describe('describeSpec', () => {
  it('describes every kind', () => {
    expect(describeSpec(toWrapperSpec('a'))).toBe('literal(a)');
    expect(describeSpec(wrapperMethod('pick'))).toBe('method(pick)');
    expect(describeSpec(toWrapperSpec(() => null))).toBe('inline');
    expect(describeSpec(SUPPRESSED)).toBe('suppressed');
    expect(describeSpec(UNSET)).toBe('unset');
  });
});
