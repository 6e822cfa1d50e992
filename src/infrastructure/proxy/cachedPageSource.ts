import type { PageFetcher, PageSource } from '@application/extraction/providers.ts'
import type { PageCacheRepository } from '../db/pageCacheRepository.ts'

/** Serves a page from the TTL cache, fetching and storing it on a miss. */
export class CachedPageSource implements PageSource {
  constructor(
    private readonly fetcher: PageFetcher,
    private readonly cache: PageCacheRepository,
  ) {}

  async load(url: string, signal: AbortSignal): Promise<string> {
    const cached = await this.cache.get(url)
    if (cached) return cached.html

    const html = await this.fetcher.fetchHtml(url, signal)
    await this.cache.put(url, html)
    return html
  }
}
