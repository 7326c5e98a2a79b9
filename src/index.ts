export type { ResultStore } from './stores/ResultStore';
export { RedisResultStore } from './stores/redis/RedisResultStore';
export type { RedisResultStoreOptions } from './stores/redis/RedisResultStore';
export { ResultStoreConfigSchema } from './stores/config';
export type { ResultStoreConfig } from './stores/config';
export { DEFAULT_KEY_PREFIX, getResultKey } from './stores/redis/redis-keys';
