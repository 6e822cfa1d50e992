import { describe, it, expect, vi, beforeEach } from 'vitest'
import { imageSource } from '@application/intake/createSource.ts'
import { createTestLarder } from '../support/testLarder.ts'

const photo = () => imageSource({ imageBase64: 'aGVsbG8=', mimeType: 'image/jpeg' })

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

describe('image intake', () => {
  it('should fall back to OCR when no vision backend is configured', async () => {
    const larder = createTestLarder({
      ocr: {
        recognizeLines: async () => [
          { text: 'Toast', confidence: 0.9 },
          { text: 'Ingredients', confidence: 0.9 },
          { text: '2 slices bread', confidence: 0.8 },
          { text: 'Method', confidence: 0.9 },
          { text: 'Toast the bread until golden', confidence: 0.7 },
        ],
      },
    })

    const draft = await larder.orchestrator.extract(photo())

    expect(draft.attempts.map((a) => [a.method, a.outcome, a.tries])).toEqual([
      ['vision', 'failure', 1],
      ['ocr-text', 'success', 1],
    ])
    expect(draft.attempts[0].error).toBe('vision extraction failed: LARDER_VISION_URL is not set')
    expect(draft).toMatchObject({ method: 'ocr-text', fallbackDepth: 1, fullyManual: false })
    expect(draft.fields.ingredients.map((m) => m.text)).toEqual(['bread'])
  })

  it('should produce a fully manual draft when no image backend is configured', async () => {
    const larder = createTestLarder()

    const draft = await larder.orchestrator.extract(photo())

    expect(draft).toMatchObject({ fullyManual: true, method: 'manual', confidence: 0 })
    expect(draft.fields.title).toBeNull()
    expect(draft.attempts.map((a) => a.error)).toEqual([
      'vision extraction failed: LARDER_VISION_URL is not set',
      'ocr-text extraction failed: LARDER_OCR_URL is not set',
    ])
  })
})
