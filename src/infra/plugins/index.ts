export { registerCors } from './cors.js';
export { registerSecurityHeaders } from './security-headers.js';
