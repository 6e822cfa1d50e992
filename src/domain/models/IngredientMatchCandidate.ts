export type MatchDecision =
  | 'auto-accepted'
  | 'needs-review'
  | 'rejected'
  | 'user-confirmed-match'
  | 'user-created-new'

export interface RankedCandidate {
  entryId: string
  canonicalName: string
  score: number
}

export interface IngredientMatchCandidate {
  mentionId: string
  /** Null proposes a new catalog entry named `proposedName`. */
  entryId: string | null
  score: number
  decision: MatchDecision
  alternatives: RankedCandidate[]
  proposedName: string
}

export const ACCEPTED_DECISIONS: ReadonlySet<MatchDecision> = new Set<MatchDecision>([
  'auto-accepted',
  'user-confirmed-match',
  'user-created-new',
])
