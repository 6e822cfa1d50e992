import { describe, it, expect, vi } from 'vitest'
import { ExtractionFailure } from '@domain/errors/LarderError.ts'
import type { ImagePayload } from '@domain/models/RawSource.ts'
import { ManualFormStrategy, ManualTextStrategy } from '@application/extraction/strategies/manualStrategies.ts'
import { OcrTextStrategy, VisionStrategy } from '@application/extraction/strategies/imageStrategies.ts'
import { JsonLdStrategy, PageTextStrategy } from '@application/extraction/strategies/urlStrategies.ts'
import type { PageSource, ScoredText, VisionReading } from '@application/extraction/providers.ts'

const signal = new AbortController().signal
const photo: ImagePayload = { imageBase64: 'aGVsbG8=', mimeType: 'image/jpeg' }

function pageOf(html: string): PageSource {
  return { load: vi.fn(async () => html) }
}

describe('ManualFormStrategy', () => {
  const strategy = new ManualFormStrategy()

  it('should take typed fields at full confidence and halve unreadable lines', async () => {
    const raw = await strategy.extractRaw({
      kind: 'form',
      title: ' Toast ',
      ingredientLines: ['2 slices bread', '', '1 tbsp butter', '2-3'],
      stepLines: ['Toast the bread.', 'Spread butter.'],
      servings: 2,
      courseCategory: 'Side dish',
    })

    expect(raw.fields.title).toBe('Toast')
    expect(raw.fields.ingredients?.map((m) => [m.id, m.text, m.unit])).toEqual([
      ['ing_1', 'bread', 'slice'],
      ['ing_2', 'butter', 'tablespoon'],
      ['ing_3', '', null],
    ])
    expect(raw.fields.courseCategory).toBe('side-dish')
    expect(raw.fieldConfidence).toEqual({
      title: 1,
      'ingredient:ing_1': 1,
      'ingredient:ing_2': 1,
      'ingredient:ing_3': 0.5,
      'instruction:step_1': 1,
      'instruction:step_2': 1,
      servings: 1,
      courseCategory: 1,
    })
  })

  it('should refuse free text without retrying', async () => {
    const failure = await strategy.extractRaw({ kind: 'text', text: 'Toast' }).catch((err: unknown) => err)
    expect(failure).toBeInstanceOf(ExtractionFailure)
    expect(failure).toMatchObject({ retryable: false })
  })
})

describe('ManualTextStrategy', () => {
  it('should score parsed text at 0.7', async () => {
    const raw = await new ManualTextStrategy().extractRaw({
      kind: 'text',
      text: 'Toast\nIngredients\n- 2 slices bread\nSteps\n1. Toast the bread',
    })
    expect(raw.fields.title).toBe('Toast')
    expect(raw.fields.instructions).toEqual([{ id: 'step_1', order: 1, text: 'Toast the bread' }])
    expect(raw.fieldConfidence).toEqual({ title: 0.7, 'ingredient:ing_1': 0.7, 'instruction:step_1': 0.7 })
  })
})

describe('VisionStrategy', () => {
  const reading: VisionReading = {
    title: { text: 'Scanned Bread', confidence: 0.9 },
    ingredients: [
      { text: '2 cups flour', confidence: 0.8 },
      { text: ' ', confidence: 0.1 },
      { text: 'tomatoe', confidence: 0.4 },
    ],
    steps: [{ text: 'Mix and bake.', confidence: 0.9 }],
    servings: { text: 'Serves 4', confidence: 0.7 },
    prepTime: null,
    cookTime: { text: '45 minutes', confidence: 0.6 },
  }

  it('should carry the provider confidence per line', async () => {
    const provider = { readRecipe: vi.fn(async () => reading) }
    const raw = await new VisionStrategy(provider).extractRaw(photo, signal)

    expect(provider.readRecipe).toHaveBeenCalledWith(photo, signal)
    expect(raw.fields.ingredients?.map((m) => [m.id, m.text])).toEqual([
      ['ing_1', 'flour'],
      ['ing_2', 'tomatoe'],
    ])
    expect(raw.fields.servings).toBe(4)
    expect(raw.fields.cookTimeMinutes).toBe(45)
    expect(raw.fieldConfidence).toEqual({
      title: 0.9,
      'ingredient:ing_1': 0.8,
      'ingredient:ing_2': 0.4,
      'instruction:step_1': 0.9,
      servings: 0.7,
      cookTimeMinutes: 0.6,
    })
  })

  it('should fail without retrying when the image holds no recipe', async () => {
    const empty: VisionReading = { title: null, ingredients: [], steps: [], servings: null, prepTime: null, cookTime: null }
    const strategy = new VisionStrategy({ readRecipe: async () => empty })
    await expect(strategy.extractRaw(photo, signal)).rejects.toMatchObject({ retryable: false })
  })
})

describe('OcrTextStrategy', () => {
  it('should score each parsed line with the confidence of the OCR line it came from', async () => {
    const lines: ScoredText[] = [
      { text: 'Bread', confidence: 0.95 },
      { text: 'Ingredients', confidence: 0.9 },
      { text: '2 cups flour', confidence: 0.85 },
      { text: 'tomatoe', confidence: 0.4 },
      { text: 'Method', confidence: 0.9 },
      { text: 'Bake for 40 minutes in a hot oven', confidence: 0.7 },
    ]
    const raw = await new OcrTextStrategy({ recognizeLines: async () => lines }).extractRaw(photo, signal)

    expect(raw.fields.title).toBe('Bread')
    expect(raw.fields.instructions?.map((s) => s.text)).toEqual(['Bake for 40 minutes in a hot oven'])
    expect(raw.fieldConfidence).toEqual({
      title: 0.95,
      'ingredient:ing_1': 0.85,
      'ingredient:ing_2': 0.4,
      'instruction:step_1': 0.7,
    })
  })
})

describe('JsonLdStrategy', () => {
  it('should read the first JSON-LD recipe on the page', async () => {
    const pages = pageOf('<script type="application/ld+json">{"@type":"Recipe","name":"Tea","recipeIngredient":["1 tea bag"]}</script>')
    const raw = await new JsonLdStrategy(pages).extractRaw({ url: 'https://example.com/tea' }, signal)

    expect(pages.load).toHaveBeenCalledWith('https://example.com/tea', signal)
    expect(raw.method).toBe('json-ld')
    expect(raw.fields.title).toBe('Tea')
    expect(raw.fieldConfidence['ingredient:ing_1']).toBe(1)
  })

  it('should fail without retrying when the page has no JSON-LD', async () => {
    const strategy = new JsonLdStrategy(pageOf('<p>Just a blog post</p>'))
    await expect(strategy.extractRaw({ url: 'https://example.com/blog' }, signal)).rejects.toMatchObject({
      retryable: false,
      message: 'json-ld extraction failed: page has no JSON-LD recipe',
    })
  })
})

describe('PageTextStrategy', () => {
  it('should read visible block text at 0.5', async () => {
    const html = `<html><body>
      <nav>Home Recipes About</nav>
      <h1>Bean Stew</h1>
      <ul><li>1 can beans</li><li>2 cups stock</li></ul>
      <p>Simmer the beans in the stock for twenty minutes.</p>
    </body></html>`
    const raw = await new PageTextStrategy(pageOf(html)).extractRaw({ url: 'https://example.com/stew' }, signal)

    expect(raw.method).toBe('page-text')
    expect(raw.fields.title).toBe('Bean Stew')
    expect(raw.fields.ingredients?.map((m) => [m.text, m.unit])).toEqual([
      ['beans', 'can'],
      ['stock', 'cup'],
    ])
    expect(raw.fields.instructions?.map((s) => s.text)).toEqual(['Simmer the beans in the stock for twenty minutes'])
    expect(raw.fieldConfidence).toEqual({
      title: 0.5,
      'ingredient:ing_1': 0.5,
      'ingredient:ing_2': 0.5,
      'instruction:step_1': 0.5,
    })
  })
})
