export { registerCors } from './cors.js';
export { registerSecurityHeaders } from './security-headers.js';
export { registerCompression, COMPRESSION_THRESHOLD_BYTES } from './compression.js';
