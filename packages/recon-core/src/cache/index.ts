export { MergedViewCache, type CacheStoreFactory, type CacheHit, type MergedViewCacheOptions } from './merged-view-cache.js';
