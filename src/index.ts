import { ExtractionOrchestrator } from '@application/extraction/ExtractionOrchestrator.ts'
import { createSourceAdapters } from '@application/extraction/sourceAdapters.ts'
import type {
  CourseClassifier,
  OcrTextProvider,
  PageFetcher,
  VisionRecipeProvider,
} from '@application/extraction/providers.ts'
import type { CatalogIndexFactory } from '@application/resolver/CatalogIndex.ts'
import { IngredientResolver } from '@application/resolver/IngredientResolver.ts'
import { ReviewGate } from '@application/review/ReviewGate.ts'
import { RecipeCommitService } from '@application/commit/RecipeCommitService.ts'
import type { CalorieLookup, CommitEventSink } from '@application/commit/ports.ts'
import { loadConfig, type LarderConfig } from '@infrastructure/config/config.ts'
import {
  DexieCatalogRepository,
  DexieCommitStore,
  DexieRecipeRepository,
  DexieReviewRepository,
  LarderDB,
  PageCacheRepository,
  hostStorage,
  type StorageFactory,
} from '@infrastructure/db/index.ts'
import { ProxyPageFetcher } from '@infrastructure/proxy/fetchViaProxy.ts'
import { CachedPageSource } from '@infrastructure/proxy/cachedPageSource.ts'
import { HttpVisionRecipeProvider } from '@infrastructure/ocr/visionRecipeProvider.ts'
import { HttpOcrTextProvider } from '@infrastructure/ocr/ocrTextProvider.ts'
import { HttpCalorieLookup, noCalorieLookup } from '@infrastructure/nutrition/calorieLookup.ts'
import { HttpCourseClassifier } from '@infrastructure/classifier/courseClassifier.ts'
import { CommitEventBus } from '@infrastructure/events/commitEventBus.ts'
import { unconfiguredOcr, unconfiguredVision } from '@infrastructure/unconfigured.ts'

export interface LarderOptions {
  config?: LarderConfig
  /** IndexedDB to persist into. Required where the host has none of its own. */
  storage?: StorageFactory
  vision?: VisionRecipeProvider
  ocr?: OcrTextProvider
  pageFetcher?: PageFetcher
  calories?: CalorieLookup
  classifier?: CourseClassifier
  /** Defaults to an in-process `CommitEventBus`, exposed as `events`. */
  eventSink?: CommitEventSink
  catalogIndex?: CatalogIndexFactory
  now?: () => Date
}

/** Wire every component over one database. Collaborators left out fall back to the configured HTTP endpoints. */
export function createLarder(options: LarderOptions = {}) {
  const config = options.config ?? loadConfig()
  const { endpoints } = config
  const now = options.now ?? (() => new Date())
  const storage = options.storage ?? hostStorage()
  if (!storage) {
    throw new Error('No IndexedDB on this host: pass `storage` to createLarder, e.g. a durable IndexedDB implementation')
  }
  const db = new LarderDB(config.dbName, storage)

  const catalog = new DexieCatalogRepository(db)
  const reviews = new DexieReviewRepository(db)
  const recipes = new DexieRecipeRepository(db)
  const pageCache = new PageCacheRepository(db, config.pageCacheTtlMs, () => now().getTime())

  const orchestrator = new ExtractionOrchestrator(
    createSourceAdapters({
      vision: options.vision ?? (endpoints.vision ? new HttpVisionRecipeProvider(endpoints.vision) : unconfiguredVision),
      ocr: options.ocr ?? (endpoints.ocr ? new HttpOcrTextProvider(endpoints.ocr) : unconfiguredOcr),
      pages: new CachedPageSource(options.pageFetcher ?? new ProxyPageFetcher(endpoints.proxy), pageCache),
    }),
    {
      ...config.extraction,
      classifier: options.classifier ?? (endpoints.classifier ? new HttpCourseClassifier(endpoints.classifier) : undefined),
      now,
    },
  )

  const resolver = new IngredientResolver({ ...config.resolver, createIndex: options.catalogIndex })
  const gate = new ReviewGate(reviews, catalog, resolver, { threshold: config.extraction.threshold, reviewTtlMs: config.reviewTtlMs, now })
  const events = new CommitEventBus()
  const commits = new RecipeCommitService({
    reviews,
    catalog,
    store: new DexieCommitStore(db),
    recipes,
    calories: options.calories ?? (endpoints.calories ? new HttpCalorieLookup(endpoints.calories) : noCalorieLookup),
    retry: config.extraction.retry,
    events: options.eventSink ?? events,
    gate,
    now,
  })

  return { config, db, catalog, orchestrator, resolver, gate, commits, events }
}

export type Larder = ReturnType<typeof createLarder>

export type { RawSource, ManualSource, ImageSource, UrlSource } from '@domain/models/RawSource.ts'
export type { ExtractionDraft, FieldPath } from '@domain/models/ExtractionDraft.ts'
export type { PendingReview } from '@domain/models/PendingReview.ts'
export type { Recipe } from '@domain/models/Recipe.ts'
export type { RecipeCommitted } from '@domain/models/RecipeCommitted.ts'
export type { MasterIngredientEntry } from '@domain/models/MasterIngredientEntry.ts'
export type { IngredientMatchCandidate } from '@domain/models/IngredientMatchCandidate.ts'
export * from '@domain/errors/LarderError.ts'
export { loadConfig, type LarderConfig } from '@infrastructure/config/config.ts'
export { manualSource, imageSource, urlSource } from '@application/intake/createSource.ts'
