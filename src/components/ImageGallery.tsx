/**
 * Image Gallery Component
 * Renders the images referenced by a recommendation payload
 */

import React from 'react';
import { normalizeImageRefs } from '../utils/imageRefs';

export interface ImageGalleryProps {
  payload: unknown;
  /** Used for alt text */
  caption?: string;
  className?: string;
}

export const ImageGallery: React.FC<ImageGalleryProps> = ({ payload, caption = 'Recommended image', className = '' }) => {
  const sources = normalizeImageRefs(payload);

  if (sources.length === 0) {
    return (
      <p className={`text-sm text-[var(--text-muted)] ${className}`} data-testid="image-gallery-empty">
        The service returned no images.
      </p>
    );
  }

  return (
    <div className={`grid grid-cols-1 sm:grid-cols-2 gap-4 ${className}`} data-testid="image-gallery">
      {sources.map((src, index) => (
        <img
          key={`${index}-${src}`}
          src={src}
          alt={`${caption} ${index + 1}`}
          className="w-full rounded-lg border border-[var(--border-color)] object-cover"
          loading="lazy"
        />
      ))}
    </div>
  );
};

export default ImageGallery;
