/**
 * Components barrel export
 */

export { DocumentUpload, toSourceDocument } from './DocumentUpload';
export { ImageGallery } from './ImageGallery';
export { StatusIndicator, getStatusConfig } from './StatusIndicator';
export { ToastContainer } from './Toast';
export { Spinner } from './Loading';
export { default as Layout, TABS } from './Layout';
