/**
 * Status Indicator Component
 * Displays the recommendation API status with an icon and label
 */

import React from 'react';
import type { DisplayedApiStatus } from '../stores/uiStore';

export interface StatusIndicatorProps {
  /** Last known API status */
  status: DisplayedApiStatus;
  /** Additional CSS class names */
  className?: string;
}

interface StatusConfig {
  text: string;
  icon: React.ReactNode;
  color: string;
  bgColor: string;
}

/**
 * Get status configuration based on API status
 */
export const getStatusConfig = (status: DisplayedApiStatus): StatusConfig => {
  switch (status) {
    case 'Running':
      return {
        text: 'Running',
        icon: (
          <svg className="w-4 h-4" fill="none" stroke="currentColor" viewBox="0 0 24 24">
            <path strokeLinecap="round" strokeLinejoin="round" strokeWidth={2} d="M5 13l4 4L19 7" />
          </svg>
        ),
        color: 'text-green-600 dark:text-green-400',
        bgColor: 'bg-green-100 dark:bg-green-900/30',
      };

    case 'NotAvailable':
      return {
        text: 'Not Available',
        icon: (
          <svg className="w-4 h-4" fill="none" stroke="currentColor" viewBox="0 0 24 24">
            <path strokeLinecap="round" strokeLinejoin="round" strokeWidth={2} d="M6 18L18 6M6 6l12 12" />
          </svg>
        ),
        color: 'text-red-600 dark:text-red-400',
        bgColor: 'bg-red-100 dark:bg-red-900/30',
      };

    case 'UnknownStatus':
      return {
        text: 'Unknown Status',
        icon: (
          <svg className="w-4 h-4" fill="none" stroke="currentColor" viewBox="0 0 24 24">
            <path strokeLinecap="round" strokeLinejoin="round" strokeWidth={2} d="M12 9v2m0 4h.01m-6.938 4h13.856c1.54 0 2.502-1.667 1.732-3L13.732 4c-.77-1.333-2.694-1.333-3.464 0L3.34 16c-.77 1.333.192 3 1.732 3z" />
          </svg>
        ),
        color: 'text-yellow-600 dark:text-yellow-400',
        bgColor: 'bg-yellow-100 dark:bg-yellow-900/30',
      };

    case 'Unknown':
      return {
        text: 'Checking',
        icon: (
          <svg className="w-4 h-4 animate-pulse" fill="none" stroke="currentColor" viewBox="0 0 24 24">
            <path strokeLinecap="round" strokeLinejoin="round" strokeWidth={2} d="M12 8v4l3 3m6-3a9 9 0 11-18 0 9 9 0 0118 0z" />
          </svg>
        ),
        color: 'text-gray-600 dark:text-gray-400',
        bgColor: 'bg-gray-100 dark:bg-gray-800',
      };
  }
};

/**
 * Status Indicator - Badge showing whether recommendations can be requested
 */
export const StatusIndicator: React.FC<StatusIndicatorProps> = ({ status, className = '' }) => {
  const config = getStatusConfig(status);

  return (
    <div
      className={`inline-flex items-center gap-2 px-3 py-1.5 rounded-full ${config.bgColor} ${className}`}
      role="status"
      aria-live="polite"
      data-testid="status-indicator"
      data-status={status}
    >
      <span className={config.color}>{config.icon}</span>
      <span className={`text-sm font-medium ${config.color}`}>
        API Status: {config.text}
      </span>
    </div>
  );
};

export default StatusIndicator;
