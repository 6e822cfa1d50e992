import type { PageFetcher } from '@application/extraction/providers.ts'

/**
 * Fetch a URL's HTML, through the proxy when one is configured.
 * Without a proxy the page is fetched directly.
 */
export class ProxyPageFetcher implements PageFetcher {
  constructor(private readonly proxyUrl: string | null) {}

  async fetchHtml(url: string, signal: AbortSignal): Promise<string> {
    if (!this.proxyUrl) {
      const response = await fetch(url, { signal })
      if (!response.ok) {
        throw new Error(`Failed to fetch: ${response.status} ${response.statusText}`)
      }
      return response.text()
    }

    const response = await fetch(`${this.proxyUrl}?url=${encodeURIComponent(url)}`, { signal })
    if (!response.ok) {
      const errorData: unknown = await response.json().catch(() => null)
      const reason =
        typeof errorData === 'object' && errorData !== null && 'error' in errorData && typeof errorData.error === 'string'
          ? errorData.error
          : response.statusText
      throw new Error(`Proxy error: ${reason}`)
    }
    return response.text()
  }
}
