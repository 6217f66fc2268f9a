// @vitest-environment node
/**
 * Property-Based Tests for the Session History Store
 *
 * Property: History is append-only, keeps insertion order, and belongs to a
 * single session.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { createHistoryStore } from '../../src/stores/historyStore';
import type { RecommendationResult } from '../../src/types';

const resultArbitrary: fc.Arbitrary<RecommendationResult> = fc.record({
  id: fc.uuid(),
  query: fc.string({ minLength: 1, maxLength: 100 }),
  mode: fc.constantFrom('ai' as const, 'stock' as const),
  payload: fc.array(fc.webUrl(), { maxLength: 3 }),
  createdAt: fc
    .integer({ min: 1577836800000, max: 1924991999999 })
    .map((timestamp) => new Date(timestamp).toISOString()),
});

describe('History Store Property Tests', () => {
  it('returns appended results in insertion order', () => {
    fc.assert(
      fc.property(fc.array(resultArbitrary, { maxLength: 20 }), (results) => {
        const history = createHistoryStore();

        for (const result of results) {
          history.getState().append(result);
        }

        expect(history.getState().all()).toEqual(results);
      }),
      { numRuns: 100 }
    );
  });

  it('grows by exactly one entry per append', () => {
    fc.assert(
      fc.property(fc.array(resultArbitrary, { minLength: 1, maxLength: 10 }), (results) => {
        const history = createHistoryStore();

        results.forEach((result, index) => {
          history.getState().append(result);
          expect(history.getState().all()).toHaveLength(index + 1);
          expect(history.getState().latest()).toEqual(result);
        });
      }),
      { numRuns: 100 }
    );
  });

  it('keeps separate sessions isolated', () => {
    fc.assert(
      fc.property(resultArbitrary, (result) => {
        const first = createHistoryStore();
        const second = createHistoryStore();

        first.getState().append(result);

        expect(first.getState().all()).toHaveLength(1);
        expect(second.getState().all()).toHaveLength(0);
        expect(second.getState().latest()).toBeNull();
      }),
      { numRuns: 50 }
    );
  });

  it('stores frozen entries that later edits to the input cannot change', () => {
    const history = createHistoryStore();
    const input = {
      id: 'rec-1',
      query: 'forest trail',
      mode: 'stock' as const,
      payload: ['a.png'],
      createdAt: '2024-01-01T00:00:00.000Z',
    };

    history.getState().append(input);
    input.query = 'edited';

    const [stored] = history.getState().all();
    expect(stored.query).toBe('forest trail');
    expect(Object.isFrozen(stored)).toBe(true);
  });
});
