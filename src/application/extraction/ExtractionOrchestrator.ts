import type { DraftFields, ExtractionDraft, StrategyAttempt } from '@domain/models/ExtractionDraft.ts'
import type { RawSource } from '@domain/models/RawSource.ts'
import { ExtractionFailure, errorMessage } from '@domain/errors/LarderError.ts'
import { generateId } from '@application/ids.ts'
import type { ExtractionStrategy, SourceAdapterRegistry } from './ExtractionStrategy.ts'
import type { CourseClassifier, CourseSuggestion } from './providers.ts'
import { callWithRetry, type RetryPolicy } from './callWithRetry.ts'
import { emptyMerge, mergeExtraction, type MergedExtraction } from './mergeExtractions.ts'
import { overallConfidence } from './scoring.ts'

export interface OrchestratorOptions {
  /** Confidence below which the next fallback strategy runs. */
  threshold: number
  /** How many fallback strategies may run after the primary one. */
  maxFallbackDepth: number
  retry: RetryPolicy
  /** Proposes a course for drafts that have text to classify. */
  classifier?: CourseClassifier
  now?: () => Date
}

/** Ceiling on a classifier's score for the course it fills in, so the reviewer always sees it. */
export const SUGGESTED_COURSE_CONFIDENCE = 0.5

function recipeText(fields: DraftFields): string {
  return [fields.title ?? '', ...fields.ingredients.map((m) => m.raw), ...fields.instructions.map((s) => s.text)]
    .filter((line) => line.trim() !== '')
    .join('\n')
}

/**
 * Runs the adapter matching a source's modality: the primary strategy first,
 * then fallbacks while confidence stays below the threshold or strategies
 * fail. Nothing is persisted here.
 */
export class ExtractionOrchestrator {
  private readonly now: () => Date

  constructor(
    private readonly adapters: SourceAdapterRegistry,
    private readonly options: OrchestratorOptions,
  ) {
    this.now = options.now ?? (() => new Date())
  }

  async extract(source: RawSource): Promise<ExtractionDraft> {
    switch (source.modality) {
      case 'manual':
        return this.runChain(source, this.adapters.manual.strategies, source.payload)
      case 'image':
        return this.runChain(source, this.adapters.image.strategies, source.payload)
      case 'url':
        return this.runChain(source, this.adapters.url.strategies, source.payload)
    }
  }

  private async runChain<P>(
    source: RawSource,
    strategies: ReadonlyArray<ExtractionStrategy<P>>,
    payload: P,
  ): Promise<ExtractionDraft> {
    const { threshold, maxFallbackDepth, retry } = this.options
    const chain = strategies.slice(0, maxFallbackDepth + 1)
    const attempts: StrategyAttempt[] = []
    let merged: MergedExtraction = emptyMerge()
    let confidence = 0
    let succeeded = 0

    for (const [depth, strategy] of chain.entries()) {
      if (depth > 0) {
        console.warn(
          `[Larder] ${chain[depth - 1].method} left confidence at ${confidence.toFixed(2)}, falling back to ${strategy.method}`,
        )
      }
      try {
        const { value, tries } = await callWithRetry(strategy.method, (signal) => strategy.extractRaw(payload, signal), retry)
        merged = mergeExtraction(merged, value, threshold)
        confidence = overallConfidence(merged.fields, merged.fieldConfidence, threshold)
        succeeded++
        attempts.push({
          method: strategy.method,
          outcome: 'success',
          confidence: overallConfidence(value.fields, value.fieldConfidence, threshold),
          tries,
          error: null,
        })
      } catch (err) {
        attempts.push({
          method: strategy.method,
          outcome: 'failure',
          confidence: null,
          tries: err instanceof ExtractionFailure ? err.tries : 1,
          error: errorMessage(err),
        })
      }
      if (succeeded > 0 && confidence >= threshold) break
    }

    const gotAnything = Object.keys(merged.fieldMethods).length > 0
    if (!gotAnything) {
      console.warn(`[Larder] every strategy for ${source.modality} source ${source.id} failed; draft needs manual entry`)
    }

    const suggestions = gotAnything ? await this.suggestCourses(merged.fields) : []
    const [top] = suggestions
    if (top && merged.fields.courseCategory === null) {
      merged.fields.courseCategory = top.category
      merged.fieldConfidence.courseCategory = Math.min(top.confidence, SUGGESTED_COURSE_CONFIDENCE)
      merged.fieldMethods.courseCategory = 'course-classifier'
    }

    return {
      id: generateId('draft'),
      sourceId: source.id,
      modality: source.modality,
      sourceUrl: source.modality === 'url' ? source.payload.url : null,
      fields: merged.fields,
      fieldConfidence: merged.fieldConfidence,
      fieldMethods: merged.fieldMethods,
      confidence,
      method: gotAnything ? (attempts.find((a) => a.outcome === 'success')?.method ?? 'manual') : 'manual',
      fallbackDepth: Math.max(0, attempts.length - 1),
      fullyManual: !gotAnything,
      attempts,
      suggestedCategories: suggestions.map((suggestion) => suggestion.category),
      createdAt: this.now().toISOString(),
    }
  }

  private async suggestCourses(fields: DraftFields): Promise<CourseSuggestion[]> {
    const { classifier, retry } = this.options
    const text = recipeText(fields)
    if (!classifier || !text) return []
    try {
      const { value } = await callWithRetry('course-classifier', (signal) => classifier.classify(text, signal), retry)
      return value
    } catch (err) {
      console.warn('[Larder] course classification failed, leaving the course to the reviewer:', errorMessage(err))
      return []
    }
  }
}
