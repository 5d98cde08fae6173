export { SQLiteAdapter } from './sqlite-adapter.js';
export * as schema from './schema.js';
