/**
 * Central export for all stores
 */

export { createHistoryStore, type HistoryStore, type HistoryStoreState } from './historyStore';
export { useUIStore, type DisplayedApiStatus, type Toast, type ToastType } from './uiStore';
