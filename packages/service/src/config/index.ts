export { loadConfig } from './loader';
export { configSchema } from './schema';
export type { ValidatedConfig } from './schema';
