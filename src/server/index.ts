/**
 * Server module exports
 */

export { ApiServer } from './express.js';
export type { ServerConfig, ServerDependencies } from './express.js';
