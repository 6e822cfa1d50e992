import type { LarderDB, PageCacheEntry } from './database.ts'

const TRACKING_PARAMS = ['utm_source', 'utm_medium', 'utm_campaign', 'utm_term', 'utm_content', 'fbclid', 'gclid']

/** Normalize URL for cache key: strip tracking params and the fragment. */
export function canonicalizeUrl(url: string): string {
  try {
    const u = new URL(url)
    for (const param of TRACKING_PARAMS) u.searchParams.delete(param)
    u.hash = ''
    return u.toString()
  } catch {
    return url
  }
}

export class PageCacheRepository {
  constructor(
    private readonly db: LarderDB,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  async get(url: string): Promise<PageCacheEntry | null> {
    const key = canonicalizeUrl(url)
    const entry = await this.db.pageCache.get(key)
    if (!entry) return null

    if (this.now() - entry.fetchedAt > this.ttlMs) {
      await this.db.pageCache.delete(key)
      return null
    }
    return entry
  }

  async put(url: string, html: string): Promise<void> {
    await this.db.pageCache.put({ canonicalUrl: canonicalizeUrl(url), fetchedAt: this.now(), html })
  }
}
