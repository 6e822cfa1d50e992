import { z } from 'zod'
import type { ImagePayload } from '@domain/models/RawSource.ts'
import type { VisionReading, VisionRecipeProvider } from '@application/extraction/providers.ts'
import { postJson } from '../http/postJson.ts'

const scored = z.object({ text: z.string(), confidence: z.number().min(0).max(1) })

const VisionResponseSchema = z.object({
  title: scored.nullable().default(null),
  ingredients: z.array(scored).default([]),
  steps: z.array(scored).default([]),
  servings: scored.nullable().default(null),
  prepTime: scored.nullable().default(null),
  cookTime: scored.nullable().default(null),
})

/** Posts the photo to a vision endpoint that answers with confidence-annotated recipe fields. */
export class HttpVisionRecipeProvider implements VisionRecipeProvider {
  constructor(private readonly endpoint: string) {}

  async readRecipe(image: ImagePayload, signal: AbortSignal): Promise<VisionReading> {
    return postJson(this.endpoint, { image: image.imageBase64, mimeType: image.mimeType }, VisionResponseSchema, signal)
  }
}
