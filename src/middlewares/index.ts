export { errorHandler } from './errorHandler';
export { notFound } from './notFound';
export { requestLogger } from './requestLogger';
export { documentUpload, MAX_BATCH_FILES } from './upload';
