import type { ManualPayload } from '@domain/models/RawSource.ts'
import type { FieldConfidence } from '@domain/models/ExtractionDraft.ts'
import { ingredientPath, instructionPath } from '@domain/models/ExtractionDraft.ts'
import type { InstructionStep } from '@domain/models/Step.ts'
import { toCourseCategory } from '@domain/constants/courseCategories.ts'
import { ExtractionFailure } from '@domain/errors/LarderError.ts'
import { parseMentions } from '@application/parser/IngredientParser.ts'
import type { ExtractionStrategy, RawExtraction } from '../ExtractionStrategy.ts'
import { parseTextRecipe } from '../parseTextRecipe.ts'
import { mentionConfidence } from '../scoring.ts'

const TEXT_CONFIDENCE = 0.7

export function toSteps(lines: readonly string[]): InstructionStep[] {
  return lines
    .map((line) => line.trim())
    .filter(Boolean)
    .map((text, i) => ({ id: `step_${i + 1}`, order: i + 1, text }))
}

/** Structured entry: every field the user typed is taken at face value. */
export class ManualFormStrategy implements ExtractionStrategy<ManualPayload> {
  readonly method = 'manual-form'

  async extractRaw(payload: ManualPayload): Promise<RawExtraction> {
    if (payload.kind !== 'form') {
      throw new ExtractionFailure(this.method, 'entry is free text, not a form', { retryable: false })
    }

    const raw: RawExtraction = { method: this.method, fields: {}, fieldConfidence: {} }
    const conf = raw.fieldConfidence

    const title = payload.title.trim()
    if (title) {
      raw.fields.title = title
      conf.title = 1
    }

    const mentions = parseMentions(payload.ingredientLines)
    if (mentions.length > 0) {
      raw.fields.ingredients = mentions
      for (const mention of mentions) conf[ingredientPath(mention.id)] = mentionConfidence(mention, 1)
    }

    const steps = toSteps(payload.stepLines)
    if (steps.length > 0) {
      raw.fields.instructions = steps
      for (const step of steps) conf[instructionPath(step.id)] = 1
    }

    if (payload.servings != null && Number.isInteger(payload.servings) && payload.servings > 0) {
      raw.fields.servings = payload.servings
      conf.servings = 1
    }

    const course = payload.courseCategory ? toCourseCategory([payload.courseCategory]) : null
    if (course !== null) {
      raw.fields.courseCategory = course
      conf.courseCategory = 1
    }

    return raw
  }
}

/** Read free text through the text parser, scoring every field at `base`. */
export function readTextRecipe(method: 'manual-text' | 'page-text', text: string | readonly string[], base: number): RawExtraction {
  const parsed = parseTextRecipe(text)
  const fieldConfidence: FieldConfidence = {}
  const raw: RawExtraction = { method, fields: {}, fieldConfidence }

  if (parsed.title) {
    raw.fields.title = parsed.title
    fieldConfidence.title = base
  }

  const mentions = parseMentions(parsed.ingredientLines.map((line) => line.text))
  if (mentions.length > 0) {
    raw.fields.ingredients = mentions
    for (const mention of mentions) fieldConfidence[ingredientPath(mention.id)] = mentionConfidence(mention, base)
  }

  const steps = toSteps(parsed.stepLines.map((line) => line.text))
  if (steps.length > 0) {
    raw.fields.instructions = steps
    for (const step of steps) fieldConfidence[instructionPath(step.id)] = base
  }

  return raw
}

/** Free text pasted by the user, split by headings and bullets. */
export class ManualTextStrategy implements ExtractionStrategy<ManualPayload> {
  readonly method = 'manual-text'

  async extractRaw(payload: ManualPayload): Promise<RawExtraction> {
    if (payload.kind !== 'text') {
      throw new ExtractionFailure(this.method, 'entry is a form, not free text', { retryable: false })
    }
    return readTextRecipe(this.method, payload.text, TEXT_CONFIDENCE)
  }
}
