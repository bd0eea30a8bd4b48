export { ArchiveClient } from './client.js';
export { createClient, createClientFromEnv } from './factory.js';
