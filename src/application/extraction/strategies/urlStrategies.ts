import type { UrlPayload } from '@domain/models/RawSource.ts'
import { ExtractionFailure } from '@domain/errors/LarderError.ts'
import type { ExtractionStrategy, RawExtraction } from '../ExtractionStrategy.ts'
import type { PageSource } from '../providers.ts'
import { extractJsonLd } from '../extractJsonLd.ts'
import { extractMicrodata } from '../extractMicrodata.ts'
import { extractPageLines } from '../html.ts'
import { schemaRecipeFields } from '../schemaRecipeFields.ts'
import { readTextRecipe } from './manualStrategies.ts'

const PAGE_TEXT_CONFIDENCE = 0.5

/** Primary web strategy: schema.org Recipe in a JSON-LD block. */
export class JsonLdStrategy implements ExtractionStrategy<UrlPayload> {
  readonly method = 'json-ld'

  constructor(private readonly pages: PageSource) {}

  async extractRaw(payload: UrlPayload, signal: AbortSignal): Promise<RawExtraction> {
    const [recipe] = extractJsonLd(await this.pages.load(payload.url, signal))
    if (!recipe) throw new ExtractionFailure(this.method, 'page has no JSON-LD recipe', { retryable: false })
    return { method: this.method, ...schemaRecipeFields(recipe, 1) }
  }
}

/** schema.org Recipe expressed as itemprop attributes. */
export class MicrodataStrategy implements ExtractionStrategy<UrlPayload> {
  readonly method = 'microdata'

  constructor(private readonly pages: PageSource) {}

  async extractRaw(payload: UrlPayload, signal: AbortSignal): Promise<RawExtraction> {
    const [recipe] = extractMicrodata(await this.pages.load(payload.url, signal))
    if (!recipe) throw new ExtractionFailure(this.method, 'page has no recipe microdata', { retryable: false })
    return { method: this.method, ...schemaRecipeFields(recipe, 0.9) }
  }
}

/** Last resort: the page's visible block text through the text parser. */
export class PageTextStrategy implements ExtractionStrategy<UrlPayload> {
  readonly method = 'page-text'

  constructor(private readonly pages: PageSource) {}

  async extractRaw(payload: UrlPayload, signal: AbortSignal): Promise<RawExtraction> {
    const lines = extractPageLines(await this.pages.load(payload.url, signal))
    if (lines.length === 0) throw new ExtractionFailure(this.method, 'page has no readable text', { retryable: false })
    return readTextRecipe(this.method, lines, PAGE_TEXT_CONFIDENCE)
  }
}
