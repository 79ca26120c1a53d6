/**
 * Transport layer exports
 */

export {
  startHttpTransport,
  stopHttpTransport,
  isHttpEnabled,
  getHttpConfig,
  createHttpApp,
  type HttpTransportConfig,
} from './http.js';
