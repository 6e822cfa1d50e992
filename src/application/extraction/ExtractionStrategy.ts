import type { DraftFields, ExtractionMethod, FieldConfidence } from '@domain/models/ExtractionDraft.ts'
import type { PayloadByModality, SourceModality } from '@domain/models/RawSource.ts'

/** What a single strategy recovered from a payload. Fields it could not read are omitted. */
export interface RawExtraction {
  method: ExtractionMethod
  fields: Partial<DraftFields>
  fieldConfidence: FieldConfidence
}

/**
 * One way of reading a payload. Implementations throw `ExtractionFailure`
 * when they cannot read it at all; a poor read is a success with low
 * confidence.
 */
export interface ExtractionStrategy<P> {
  readonly method: ExtractionMethod
  extractRaw(payload: P, signal: AbortSignal): Promise<RawExtraction>
}

/** Ordered strategies for one modality: primary first, then fallbacks. */
export interface SourceAdapter<M extends SourceModality> {
  readonly modality: M
  readonly strategies: ReadonlyArray<ExtractionStrategy<PayloadByModality[M]>>
}

export type SourceAdapterRegistry = { readonly [M in SourceModality]: SourceAdapter<M> }
