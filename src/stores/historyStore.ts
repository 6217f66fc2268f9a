/**
 * History Store - Append-only log of recommendations for one session
 *
 * Each session owns its own store; nothing is shared at module level.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import type { RecommendationResult } from '../types';

interface HistoryState {
  entries: readonly RecommendationResult[];
}

interface HistoryActions {
  append: (result: RecommendationResult) => void;
  all: () => readonly RecommendationResult[];
  latest: () => RecommendationResult | null;
}

export type HistoryStoreState = HistoryState & HistoryActions;

export type HistoryStore = StoreApi<HistoryStoreState>;

export const createHistoryStore = (): HistoryStore =>
  createStore<HistoryStoreState>((set, get) => ({
    entries: [],

    append: (result: RecommendationResult) => {
      set(state => ({
        entries: [...state.entries, Object.freeze({ ...result })],
      }));
    },

    all: () => get().entries,

    latest: () => {
      const { entries } = get();
      return entries.length > 0 ? entries[entries.length - 1] : null;
    },
  }));
