export type SourceModality = 'manual' | 'image' | 'url'

export interface ManualFormPayload {
  kind: 'form'
  title: string
  ingredientLines: string[]
  stepLines: string[]
  servings?: number | null
  courseCategory?: string | null
}

export interface ManualTextPayload {
  kind: 'text'
  text: string
}

export type ManualPayload = ManualFormPayload | ManualTextPayload

export interface ImagePayload {
  imageBase64: string
  mimeType: string
}

export interface UrlPayload {
  url: string
}

interface SourceBase<M extends SourceModality, P> {
  readonly id: string
  readonly modality: M
  readonly payload: Readonly<P>
  readonly ingestedAt: string
}

export type ManualSource = SourceBase<'manual', ManualPayload>
export type ImageSource = SourceBase<'image', ImagePayload>
export type UrlSource = SourceBase<'url', UrlPayload>

export type RawSource = ManualSource | ImageSource | UrlSource

/** Maps a modality to the payload its sources carry. */
export interface PayloadByModality {
  manual: ManualPayload
  image: ImagePayload
  url: UrlPayload
}
