import { z } from 'zod'
import type { ImagePayload } from '@domain/models/RawSource.ts'
import type { OcrTextProvider, ScoredText } from '@application/extraction/providers.ts'
import { postJson } from '../http/postJson.ts'

const OcrResponseSchema = z.object({
  lines: z.array(
    z.object({
      text: z.string(),
      // Some engines report 0-100
      confidence: z.number().min(0).max(100).transform((c) => (c > 1 ? c / 100 : c)),
    }),
  ),
})

export class HttpOcrTextProvider implements OcrTextProvider {
  constructor(private readonly endpoint: string) {}

  async recognizeLines(image: ImagePayload, signal: AbortSignal): Promise<ScoredText[]> {
    const { lines } = await postJson(
      this.endpoint,
      { image: image.imageBase64, mimeType: image.mimeType },
      OcrResponseSchema,
      signal,
    )
    return lines
  }
}
