export { CollectorServer } from './server.js';
export type { CollectorServerConfig, CollectorStats, ReceivedMessage } from './server.js';
