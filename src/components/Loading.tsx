/**
 * Loading Component
 * Spinner shown while a recommendation request is in flight
 */

import React from 'react';

export type LoadingSize = 'sm' | 'md' | 'lg';

const sizeConfig: Record<LoadingSize, string> = {
  sm: 'w-4 h-4',
  md: 'w-8 h-8',
  lg: 'w-12 h-12',
};

/**
 * Spinner Component - Animated circular spinner
 */
export const Spinner: React.FC<{ size?: LoadingSize; className?: string }> = ({
  size = 'md',
  className = '',
}) => (
  <svg
    className={`animate-spin text-blue-600 dark:text-blue-400 ${sizeConfig[size]} ${className}`}
    xmlns="http://www.w3.org/2000/svg"
    fill="none"
    viewBox="0 0 24 24"
    data-testid="loading-spinner"
  >
    <circle className="opacity-25" cx="12" cy="12" r="10" stroke="currentColor" strokeWidth="4" />
    <path
      className="opacity-75"
      fill="currentColor"
      d="M4 12a8 8 0 018-8V0C5.373 0 0 5.373 0 12h4zm2 5.291A7.962 7.962 0 014 12H0c0 3.042 1.135 5.824 3 7.938l3-2.647z"
    />
  </svg>
);

export default Spinner;
