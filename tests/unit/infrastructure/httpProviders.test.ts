import { describe, it, expect, vi, afterEach } from 'vitest'
import { z } from 'zod'
import { postJson } from '@infrastructure/http/postJson.ts'
import { HttpOcrTextProvider } from '@infrastructure/ocr/ocrTextProvider.ts'
import { HttpVisionRecipeProvider } from '@infrastructure/ocr/visionRecipeProvider.ts'
import { HttpCalorieLookup } from '@infrastructure/nutrition/calorieLookup.ts'
import { HttpCourseClassifier } from '@infrastructure/classifier/courseClassifier.ts'
import { ProxyPageFetcher } from '@infrastructure/proxy/fetchViaProxy.ts'

function reply(body: unknown, status = 200): Response {
  return new Response(typeof body === 'string' ? body : JSON.stringify(body), {
    status,
    headers: { 'Content-Type': typeof body === 'string' ? 'text/html' : 'application/json' },
  })
}

function stubFetch(response: Response) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => response)
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

const photo = { imageBase64: 'aGVsbG8=', mimeType: 'image/png' }
const signal = new AbortController().signal

afterEach(() => {
  vi.unstubAllGlobals()
})

describe('postJson', () => {
  const schema = z.object({ ok: z.boolean() })

  it('should post JSON and return the validated reply', async () => {
    const fetchMock = stubFetch(reply({ ok: true }))

    expect(await postJson('https://api.test/check', { a: 1 }, schema)).toEqual({ ok: true })
    expect(fetchMock).toHaveBeenCalledWith('https://api.test/check', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"a":1}',
      signal: undefined,
    })
  })

  it('should surface the server error text', async () => {
    stubFetch(reply({ error: 'quota exceeded' }, 429))
    await expect(postJson('https://api.test/check', {}, schema)).rejects.toThrow('quota exceeded')
  })

  it('should fall back to the status when the error body is not JSON', async () => {
    stubFetch(reply('<h1>Bad gateway</h1>', 502))
    await expect(postJson('https://api.test/check', {}, schema)).rejects.toThrow('Server error (502)')
  })

  it('should reject a reply of the wrong shape', async () => {
    stubFetch(reply({ ok: 'yes' }))
    await expect(postJson('https://api.test/check', {}, schema)).rejects.toThrow(/^Invalid response from \/check: /)
  })
})

describe('HttpOcrTextProvider', () => {
  it('should scale percent confidences to 0-1', async () => {
    const fetchMock = stubFetch(reply({ lines: [{ text: 'Bread', confidence: 87 }, { text: 'flour', confidence: 0.5 }] }))

    const lines = await new HttpOcrTextProvider('https://ocr.test/read').recognizeLines(photo, signal)

    expect(lines).toEqual([
      { text: 'Bread', confidence: 0.87 },
      { text: 'flour', confidence: 0.5 },
    ])
    expect(fetchMock.mock.calls[0][1]?.body).toBe('{"image":"aGVsbG8=","mimeType":"image/png"}')
  })
})

describe('HttpVisionRecipeProvider', () => {
  it('should default the fields the backend leaves out', async () => {
    stubFetch(reply({ title: { text: 'Bread', confidence: 0.9 } }))

    expect(await new HttpVisionRecipeProvider('https://vision.test/read').readRecipe(photo, signal)).toEqual({
      title: { text: 'Bread', confidence: 0.9 },
      ingredients: [],
      steps: [],
      servings: null,
      prepTime: null,
      cookTime: null,
    })
  })
})

describe('HttpCalorieLookup', () => {
  it('should return the facts the backend knows', async () => {
    const fetchMock = stubFetch(reply({ kcalPer100g: 130, source: 'test-table' }))
    expect(await new HttpCalorieLookup('https://kcal.test').lookupCalories('rice', signal)).toEqual({
      kcalPer100g: 130,
      source: 'test-table',
    })
    expect(fetchMock.mock.calls[0][1]?.signal).toBe(signal)
  })

  it('should return null for an unknown ingredient', async () => {
    stubFetch(reply({ kcalPer100g: null }))
    expect(await new HttpCalorieLookup('https://kcal.test').lookupCalories('unobtainium', signal)).toBeNull()
  })
})

describe('HttpCourseClassifier', () => {
  it('should keep known courses at their best score, most likely first', async () => {
    const fetchMock = stubFetch(
      reply({
        suggestions: [
          { category: 'Dessert', confidence: 0.4 },
          { category: 'Antipasti', confidence: 0.7 },
          { category: 'brunch', confidence: 0.9 },
          { category: 'dolci', confidence: 0.6 },
        ],
      }),
    )

    expect(await new HttpCourseClassifier('https://classify.test').classify('Shortbread', signal)).toEqual([
      { category: 'appetizer', confidence: 0.7 },
      { category: 'dessert', confidence: 0.6 },
    ])
    expect(fetchMock.mock.calls[0][1]?.body).toBe('{"text":"Shortbread"}')
    expect(fetchMock.mock.calls[0][1]?.signal).toBe(signal)
  })

  it('should read a reply without suggestions as none', async () => {
    stubFetch(reply({}))
    expect(await new HttpCourseClassifier('https://classify.test').classify('Shortbread', signal)).toEqual([])
  })
})

describe('ProxyPageFetcher', () => {
  it('should fetch directly without a proxy', async () => {
    const fetchMock = stubFetch(reply('<html></html>'))

    expect(await new ProxyPageFetcher(null).fetchHtml('https://example.com/a', signal)).toBe('<html></html>')
    expect(fetchMock).toHaveBeenCalledWith('https://example.com/a', { signal })
  })

  it('should pass the page URL to the proxy encoded', async () => {
    const fetchMock = stubFetch(reply('<html></html>'))

    await new ProxyPageFetcher('https://proxy.test/fetch').fetchHtml('https://example.com/a?b=1', signal)

    expect(fetchMock).toHaveBeenCalledWith('https://proxy.test/fetch?url=https%3A%2F%2Fexample.com%2Fa%3Fb%3D1', {
      signal,
    })
  })

  it('should report proxy errors with the proxy reason', async () => {
    stubFetch(reply({ error: 'blocked by robots.txt' }, 403))
    await expect(new ProxyPageFetcher('https://proxy.test/fetch').fetchHtml('https://example.com/a', signal)).rejects.toThrow(
      'Proxy error: blocked by robots.txt',
    )
  })

  it('should report direct fetch failures with the status', async () => {
    stubFetch(new Response('gone', { status: 404, statusText: 'Not Found' }))
    await expect(new ProxyPageFetcher(null).fetchHtml('https://example.com/a', signal)).rejects.toThrow(
      'Failed to fetch: 404 Not Found',
    )
  })
})
