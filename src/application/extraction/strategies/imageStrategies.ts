import type { ImagePayload } from '@domain/models/RawSource.ts'
import { ingredientPath, instructionPath } from '@domain/models/ExtractionDraft.ts'
import { ExtractionFailure } from '@domain/errors/LarderError.ts'
import { parseMention } from '@application/parser/IngredientParser.ts'
import type { ExtractionStrategy, RawExtraction } from '../ExtractionStrategy.ts'
import type { OcrTextProvider, ScoredText, VisionRecipeProvider } from '../providers.ts'
import { parseTextRecipe, type TextLine } from '../parseTextRecipe.ts'
import { parseInformalDuration } from '../parseDuration.ts'
import { clamp01, mentionConfidence } from '../scoring.ts'

/** Add scored ingredient and step lines to an extraction, ids following line order. */
function addLines(raw: RawExtraction, ingredients: ScoredText[], steps: ScoredText[]): void {
  const mentions = ingredients
    .filter((line) => line.text.trim())
    .map((line, i) => ({ mention: parseMention(line.text, `ing_${i + 1}`), confidence: line.confidence }))
  if (mentions.length > 0) {
    raw.fields.ingredients = mentions.map(({ mention }) => mention)
    for (const { mention, confidence } of mentions) {
      raw.fieldConfidence[ingredientPath(mention.id)] = mentionConfidence(mention, confidence)
    }
  }

  const stepLines = steps.filter((line) => line.text.trim())
  if (stepLines.length > 0) {
    raw.fields.instructions = stepLines.map((line, i) => ({ id: `step_${i + 1}`, order: i + 1, text: line.text.trim() }))
    stepLines.forEach((line, i) => {
      raw.fieldConfidence[instructionPath(`step_${i + 1}`)] = clamp01(line.confidence)
    })
  }
}

/** Primary image strategy: a vision backend reads the recipe structure directly. */
export class VisionStrategy implements ExtractionStrategy<ImagePayload> {
  readonly method = 'vision'

  constructor(private readonly provider: VisionRecipeProvider) {}

  async extractRaw(payload: ImagePayload, signal: AbortSignal): Promise<RawExtraction> {
    const reading = await this.provider.readRecipe(payload, signal)
    const title = reading.title?.text.trim() ?? ''
    if (!title && reading.ingredients.length === 0 && reading.steps.length === 0) {
      throw new ExtractionFailure(this.method, 'no recipe found in the image', { retryable: false })
    }

    const raw: RawExtraction = { method: this.method, fields: {}, fieldConfidence: {} }
    if (title && reading.title) {
      raw.fields.title = title
      raw.fieldConfidence.title = clamp01(reading.title.confidence)
    }
    addLines(raw, reading.ingredients, reading.steps)

    const servings = reading.servings?.text.match(/(\d+)/)
    if (reading.servings && servings) {
      raw.fields.servings = parseInt(servings[1], 10)
      raw.fieldConfidence.servings = clamp01(reading.servings.confidence)
    }
    for (const [key, value] of [
      ['prepTimeMinutes', reading.prepTime],
      ['cookTimeMinutes', reading.cookTime],
    ] as const) {
      const minutes = parseInformalDuration(value?.text)
      if (value && minutes !== null) {
        raw.fields[key] = minutes
        raw.fieldConfidence[key] = clamp01(value.confidence)
      }
    }
    return raw
  }
}

/** Fallback image strategy: plain OCR lines, classified by the text parser. */
export class OcrTextStrategy implements ExtractionStrategy<ImagePayload> {
  readonly method = 'ocr-text'

  constructor(private readonly provider: OcrTextProvider) {}

  async extractRaw(payload: ImagePayload, signal: AbortSignal): Promise<RawExtraction> {
    const lines = await this.provider.recognizeLines(payload, signal)
    const parsed = parseTextRecipe(lines.map((line) => line.text))
    if (!parsed.title && parsed.ingredientLines.length === 0 && parsed.stepLines.length === 0) {
      throw new ExtractionFailure(this.method, 'no text recognised in the image', { retryable: false })
    }

    const scored = (line: TextLine): ScoredText => ({ text: line.text, confidence: lines[line.sourceIndex].confidence })
    const raw: RawExtraction = { method: this.method, fields: {}, fieldConfidence: {} }
    const titleLine = lines.find((line) => line.text.trim())
    if (parsed.title && titleLine) {
      raw.fields.title = parsed.title
      raw.fieldConfidence.title = clamp01(titleLine.confidence)
    }
    addLines(raw, parsed.ingredientLines.map(scored), parsed.stepLines.map(scored))
    return raw
  }
}
