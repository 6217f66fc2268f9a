/**
 * Toast Component
 * Shows pipeline notices (errors, confirmations) as dismissible toasts
 */

import React from 'react';
import { createPortal } from 'react-dom';
import { useUIStore, type Toast, type ToastType } from '../stores/uiStore';

const TOAST_STYLES: Record<ToastType, string> = {
  success: 'bg-green-50 text-green-800 border-green-200 dark:bg-green-900/30 dark:text-green-300 dark:border-green-800',
  error: 'bg-red-50 text-red-800 border-red-200 dark:bg-red-900/30 dark:text-red-300 dark:border-red-800',
  warning: 'bg-yellow-50 text-yellow-800 border-yellow-200 dark:bg-yellow-900/30 dark:text-yellow-300 dark:border-yellow-800',
  info: 'bg-blue-50 text-blue-800 border-blue-200 dark:bg-blue-900/30 dark:text-blue-300 dark:border-blue-800',
};

interface ToastItemProps {
  toast: Toast;
  onDismiss: (id: string) => void;
}

const ToastItem: React.FC<ToastItemProps> = ({ toast, onDismiss }) => (
  <div
    className={`flex items-center gap-3 px-4 py-3 rounded-lg shadow-lg border ${TOAST_STYLES[toast.type]}`}
    role="alert"
    data-testid={`toast-${toast.type}`}
  >
    <p className="text-sm font-medium flex-1">{toast.message}</p>
    <button
      type="button"
      onClick={() => onDismiss(toast.id)}
      className="flex-shrink-0 p-1 rounded-full hover:bg-black/5 dark:hover:bg-white/10 transition-colors"
      aria-label="Close"
    >
      <svg className="w-4 h-4" fill="none" stroke="currentColor" viewBox="0 0 24 24">
        <path strokeLinecap="round" strokeLinejoin="round" strokeWidth={2} d="M6 18L18 6M6 6l12 12" />
      </svg>
    </button>
  </div>
);

/**
 * Toast list; rendered into document.body so it floats above every tab
 */
export const ToastContainer: React.FC = () => {
  const { toasts, dismissToast } = useUIStore();

  const list = (
    <div
      className="fixed top-4 right-4 z-50 flex flex-col gap-2 max-w-md w-full"
      data-testid="toast-container"
    >
      {toasts.map((toast) => (
        <ToastItem key={toast.id} toast={toast} onDismiss={dismissToast} />
      ))}
    </div>
  );

  return createPortal(list, document.body);
};

export default ToastContainer;
