export { LarderDB, hostStorage, type StorageFactory, type PageCacheEntry, type OutboxRecord } from './database.ts'
export { DexieCatalogRepository } from './catalogRepository.ts'
export { DexieReviewRepository } from './reviewRepository.ts'
export { DexieRecipeRepository } from './recipeRepository.ts'
export { DexieCommitStore } from './commitRepository.ts'
export { PageCacheRepository, canonicalizeUrl } from './pageCacheRepository.ts'
