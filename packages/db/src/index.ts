export * from './client.js';
export * from './migrations.js';
export * from './schema.js';
