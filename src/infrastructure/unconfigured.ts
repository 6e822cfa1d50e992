import { ExtractionFailure } from '@domain/errors/LarderError.ts'
import type { OcrTextProvider, VisionRecipeProvider } from '@application/extraction/providers.ts'

function unavailable(method: 'vision' | 'ocr-text', setting: string): never {
  throw new ExtractionFailure(method, `${setting} is not set`, { retryable: false })
}

/** Stand-ins for collaborators whose endpoint is not configured. They fail without retrying. */
export const unconfiguredVision: VisionRecipeProvider = {
  readRecipe: async () => unavailable('vision', 'LARDER_VISION_URL'),
}

export const unconfiguredOcr: OcrTextProvider = {
  recognizeLines: async () => unavailable('ocr-text', 'LARDER_OCR_URL'),
}

