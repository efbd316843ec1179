export { registerRoutes } from './routes.js';
export { ApiError, ErrorCode, installErrorHandler, statusForKind } from './errors.js';
