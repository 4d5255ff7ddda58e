export { errorHandler, toFieldErrors } from './error-handler.js';
export { validate } from './validate.js';
export { asyncHandler } from './async-handler.js';
export { requestLogger } from './request-logger.js';
export { createAuthenticate, getAuthUser, parseAuthorizationHeader } from './authenticate.js';
export { createImageUpload, IMAGE_FIELD } from './upload.js';
