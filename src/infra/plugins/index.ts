export { registerCors, getAllowedOrigins, isLocalhostOrigin } from './cors.js';
export { registerSecurityHeaders } from './security-headers.js';
