/**
 * UI Store - Manages API status, busy state, and toast notifications
 */

import { create } from 'zustand';
import type { ApiStatus } from '../types';

export type ToastType = 'success' | 'error' | 'warning' | 'info';

export interface Toast {
  id: string;
  type: ToastType;
  message: string;
  duration?: number;
}

/** 'Unknown' until the first status check returns */
export type DisplayedApiStatus = ApiStatus | 'Unknown';

interface UIState {
  apiStatus: DisplayedApiStatus;
  isLoading: boolean;
  toasts: Toast[];
}

interface UIActions {
  setApiStatus: (status: DisplayedApiStatus) => void;
  setLoading: (isLoading: boolean) => void;
  showToast: (type: ToastType, message: string, duration?: number) => void;
  dismissToast: (id: string) => void;
}

type UIStore = UIState & UIActions;

// Generate unique ID for toasts
const generateId = () => `toast-${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;

export const useUIStore = create<UIStore>((set) => ({
  // State
  apiStatus: 'Unknown',
  isLoading: false,
  toasts: [],

  // Actions
  setApiStatus: (apiStatus: DisplayedApiStatus) => {
    set({ apiStatus });
  },

  setLoading: (isLoading: boolean) => {
    set({ isLoading });
  },

  showToast: (type: ToastType, message: string, duration = 5000) => {
    const id = generateId();
    set(state => ({
      toasts: [...state.toasts, { id, type, message, duration }],
    }));

    // Auto-dismiss toast after duration
    if (duration > 0) {
      setTimeout(() => {
        set(state => ({
          toasts: state.toasts.filter(t => t.id !== id),
        }));
      }, duration);
    }
  },

  dismissToast: (id: string) => {
    set(state => ({
      toasts: state.toasts.filter(t => t.id !== id),
    }));
  },
}));
