import { z } from 'zod'
import { toCourseCategory } from '@domain/constants/courseCategories.ts'
import type { CourseClassifier, CourseSuggestion } from '@application/extraction/providers.ts'
import { postJson } from '../http/postJson.ts'

const ClassifierResponseSchema = z.object({
  suggestions: z.array(z.object({ category: z.string(), confidence: z.number().min(0).max(1) })).default([]),
})

/**
 * Posts recipe text to a classification endpoint. Labels outside the course
 * set are dropped; a course named twice keeps its best score.
 */
export class HttpCourseClassifier implements CourseClassifier {
  constructor(private readonly endpoint: string) {}

  async classify(recipeText: string, signal: AbortSignal): Promise<CourseSuggestion[]> {
    const { suggestions } = await postJson(this.endpoint, { text: recipeText }, ClassifierResponseSchema, signal)
    const best = new Map<CourseSuggestion['category'], number>()
    for (const { category, confidence } of suggestions) {
      const course = toCourseCategory([category])
      if (course !== null && confidence > (best.get(course) ?? -1)) best.set(course, confidence)
    }
    return [...best]
      .map(([category, confidence]) => ({ category, confidence }))
      .sort((a, b) => b.confidence - a.confidence)
  }
}
