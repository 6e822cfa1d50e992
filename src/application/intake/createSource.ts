import { z } from 'zod'
import type {
  ImagePayload,
  ImageSource,
  ManualPayload,
  ManualSource,
  UrlPayload,
  UrlSource,
} from '@domain/models/RawSource.ts'
import { InvalidFieldError } from '@domain/errors/LarderError.ts'
import { generateId } from '@application/ids.ts'

const ManualPayloadSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('form'),
    title: z.string(),
    ingredientLines: z.array(z.string()),
    stepLines: z.array(z.string()),
    servings: z.number().int().positive().nullable().optional(),
    courseCategory: z.string().nullable().optional(),
  }),
  z.object({ kind: z.literal('text'), text: z.string().min(1) }),
])

const ImagePayloadSchema = z.object({
  imageBase64: z.string().min(1),
  mimeType: z.string().regex(/^image\//, 'expected an image MIME type'),
})

const UrlPayloadSchema = z.object({
  url: z
    .string()
    .trim()
    .url()
    .refine((url) => /^https?:\/\//i.test(url), 'only http and https pages can be imported'),
})

function parsePayload<S extends z.ZodTypeAny>(schema: S, payload: unknown): z.output<S> {
  const parsed = schema.safeParse(payload)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new InvalidFieldError(issue?.path.join('.') || 'payload', issue?.message ?? 'invalid payload')
  }
  return parsed.data
}

function stamp(): { id: string; ingestedAt: string } {
  return { id: generateId('src'), ingestedAt: new Date().toISOString() }
}

export function manualSource(payload: ManualPayload): ManualSource {
  return Object.freeze({ ...stamp(), modality: 'manual', payload: Object.freeze(parsePayload(ManualPayloadSchema, payload)) })
}

export function imageSource(payload: ImagePayload): ImageSource {
  return Object.freeze({ ...stamp(), modality: 'image', payload: Object.freeze(parsePayload(ImagePayloadSchema, payload)) })
}

export function urlSource(payload: UrlPayload): UrlSource {
  return Object.freeze({ ...stamp(), modality: 'url', payload: Object.freeze(parsePayload(UrlPayloadSchema, payload)) })
}
