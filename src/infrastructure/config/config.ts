import { z } from 'zod'

const score = z.coerce.number().min(0).max(1)
const count = z.coerce.number().int().min(0)
const millis = z.coerce.number().int().positive()
const endpoint = z.string().url().optional()

const HOUR_MS = 60 * 60 * 1000

export const EnvSchema = z.object({
  LARDER_DB_NAME: z.string().min(1).default('LarderDB'),
  LARDER_CONFIDENCE_THRESHOLD: score.default(0.6),
  LARDER_MAX_FALLBACK_DEPTH: count.default(2),
  LARDER_STRATEGY_RETRIES: count.default(2),
  LARDER_STRATEGY_TIMEOUT_MS: millis.default(15_000),
  LARDER_RETRY_BACKOFF_MS: millis.default(250),
  LARDER_AUTO_ACCEPT_THRESHOLD: score.default(0.92),
  LARDER_REVIEW_THRESHOLD: score.default(0.75),
  LARDER_REVIEW_TTL_MS: millis.default(7 * 24 * HOUR_MS),
  LARDER_PAGE_CACHE_TTL_MS: millis.default(24 * HOUR_MS),
  LARDER_PROXY_URL: endpoint,
  LARDER_VISION_URL: endpoint,
  LARDER_OCR_URL: endpoint,
  LARDER_CALORIES_URL: endpoint,
  LARDER_CLASSIFIER_URL: endpoint,
})

export interface LarderConfig {
  dbName: string
  extraction: {
    threshold: number
    maxFallbackDepth: number
    retry: { retries: number; timeoutMs: number; backoffMs: number }
  }
  resolver: { autoAcceptThreshold: number; reviewThreshold: number }
  reviewTtlMs: number
  pageCacheTtlMs: number
  endpoints: {
    proxy: string | null
    vision: string | null
    ocr: string | null
    calories: string | null
    classifier: string | null
  }
}

/** Read LARDER_* settings; anything unset takes its default. Throws a ZodError on invalid values. */
export function loadConfig(env: Record<string, string | undefined> = process.env): LarderConfig {
  const parsed = EnvSchema.parse(env)
  if (parsed.LARDER_REVIEW_THRESHOLD > parsed.LARDER_AUTO_ACCEPT_THRESHOLD) {
    throw new Error('LARDER_REVIEW_THRESHOLD must not exceed LARDER_AUTO_ACCEPT_THRESHOLD')
  }
  return {
    dbName: parsed.LARDER_DB_NAME,
    extraction: {
      threshold: parsed.LARDER_CONFIDENCE_THRESHOLD,
      maxFallbackDepth: parsed.LARDER_MAX_FALLBACK_DEPTH,
      retry: {
        retries: parsed.LARDER_STRATEGY_RETRIES,
        timeoutMs: parsed.LARDER_STRATEGY_TIMEOUT_MS,
        backoffMs: parsed.LARDER_RETRY_BACKOFF_MS,
      },
    },
    resolver: {
      autoAcceptThreshold: parsed.LARDER_AUTO_ACCEPT_THRESHOLD,
      reviewThreshold: parsed.LARDER_REVIEW_THRESHOLD,
    },
    reviewTtlMs: parsed.LARDER_REVIEW_TTL_MS,
    pageCacheTtlMs: parsed.LARDER_PAGE_CACHE_TTL_MS,
    endpoints: {
      proxy: parsed.LARDER_PROXY_URL ?? null,
      vision: parsed.LARDER_VISION_URL ?? null,
      ocr: parsed.LARDER_OCR_URL ?? null,
      calories: parsed.LARDER_CALORIES_URL ?? null,
      classifier: parsed.LARDER_CLASSIFIER_URL ?? null,
    },
  }
}
