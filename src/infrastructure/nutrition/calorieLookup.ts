import { z } from 'zod'
import type { CalorieFacts, CalorieLookup } from '@application/commit/ports.ts'
import { postJson } from '../http/postJson.ts'

const CalorieResponseSchema = z.object({
  kcalPer100g: z.number().nonnegative().nullable(),
  source: z.string().default('unknown'),
})

export class HttpCalorieLookup implements CalorieLookup {
  constructor(private readonly endpoint: string) {}

  async lookupCalories(name: string, signal: AbortSignal): Promise<CalorieFacts | null> {
    const { kcalPer100g, source } = await postJson(this.endpoint, { name }, CalorieResponseSchema, signal)
    return kcalPer100g === null ? null : { kcalPer100g, source }
  }
}

/** Used when no calorie endpoint is configured. */
export const noCalorieLookup: CalorieLookup = {
  async lookupCalories() {
    return null
  },
}
