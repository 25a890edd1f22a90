/**
 * Condition Evaluation Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  matchesWhen,
  matchesWhenList,
  whenListVariables,
  lookupVariable,
} from '../src/option/when.js';
import { createWhen, withWhenEqual, withWhenNotEqual, whenFalse, whenTrue } from './helpers.js';

describe('Condition evaluation', () => {
  describe('lookupVariable', () => {
    it('should return the value of a known variable', () => {
      expect(lookupVariable({ foo: 'bar' }, 'foo')).toBe('bar');
    });

    it('should treat missing variables as empty', () => {
      expect(lookupVariable({}, 'foo')).toBe('');
      expect(lookupVariable(null, 'foo')).toBe('');
    });

    it('should not read inherited object properties', () => {
      expect(lookupVariable({}, 'constructor')).toBe('');
    });
  });

  describe('matchesWhen', () => {
    it('should match an empty condition for any input', () => {
      expect(matchesWhen(whenTrue, null)).toBe(true);
      expect(matchesWhen(whenTrue, { foo: 'bar' })).toBe(true);
    });

    it('should require every equal entry to match', () => {
      const when = createWhen(withWhenEqual('foo', 'a'), withWhenEqual('bar', 'b'));

      expect(matchesWhen(when, { foo: 'a', bar: 'b' })).toBe(true);
      expect(matchesWhen(when, { foo: 'a', bar: 'x' })).toBe(false);
    });

    it('should fail a not-equal entry when the value matches', () => {
      const when = createWhen(withWhenNotEqual('foo', 'a'));

      expect(matchesWhen(when, { foo: 'a' })).toBe(false);
      expect(matchesWhen(when, { foo: 'b' })).toBe(true);
    });

    it('should compare missing variables as the empty string', () => {
      expect(matchesWhen(createWhen(withWhenEqual('foo', '')), {})).toBe(true);
      expect(matchesWhen(createWhen(withWhenNotEqual('foo', '')), {})).toBe(false);
      expect(matchesWhen(createWhen(withWhenNotEqual('foo', 'a')), null)).toBe(true);
    });

    it('should combine equal and not-equal checks', () => {
      const when = createWhen(withWhenEqual('stage', 'prod'), withWhenNotEqual('region', 'eu'));

      expect(matchesWhen(when, { stage: 'prod', region: 'us' })).toBe(true);
      expect(matchesWhen(when, { stage: 'prod', region: 'eu' })).toBe(false);
    });
  });

  describe('matchesWhenList', () => {
    it('should match an empty list', () => {
      expect(matchesWhenList([], null)).toBe(true);
    });

    it('should require every condition to match', () => {
      expect(matchesWhenList([whenTrue, whenTrue], {})).toBe(true);
      expect(matchesWhenList([whenTrue, whenFalse], {})).toBe(false);
      expect(matchesWhenList([whenFalse, whenTrue], {})).toBe(false);
    });
  });

  describe('whenListVariables', () => {
    it('should collect names from equal and not-equal maps without duplicates', () => {
      const whenList = [
        createWhen(withWhenEqual('foo', 'a'), withWhenNotEqual('bar', 'b')),
        createWhen(withWhenEqual('bar', 'c'), withWhenEqual('baz', 'd')),
      ];

      expect(whenListVariables(whenList)).toEqual(['foo', 'bar', 'baz']);
    });

    it('should return nothing for an unconditional guard', () => {
      expect(whenListVariables([])).toEqual([]);
      expect(whenListVariables([whenTrue])).toEqual([]);
    });
  });
});
