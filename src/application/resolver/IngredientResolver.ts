import type { RawIngredientMention } from '@domain/models/Ingredient.ts'
import type { MasterIngredientEntry } from '@domain/models/MasterIngredientEntry.ts'
import type { IngredientMatchCandidate, RankedCandidate } from '@domain/models/IngredientMatchCandidate.ts'
import { linearCatalogIndex, type CatalogIndexFactory } from './CatalogIndex.ts'
import { normalizeIngredientName } from './normalizeIngredientName.ts'
import { similarity } from './similarity.ts'

export interface ResolverOptions {
  /** At or above: bound without asking. */
  autoAcceptThreshold: number
  /** At or above (and below auto-accept): suggested for review. Below: propose a new entry. */
  reviewThreshold: number
  alternatives?: number
  createIndex?: CatalogIndexFactory
}

function byRank(a: RankedCandidate, b: RankedCandidate): number {
  if (a.score !== b.score) return b.score - a.score
  if (a.canonicalName !== b.canonicalName) return a.canonicalName < b.canonicalName ? -1 : 1
  if (a.entryId !== b.entryId) return a.entryId < b.entryId ? -1 : 1
  return 0
}

/**
 * Binds mentions to catalog entries by normalized-key similarity. Pure: the
 * same mentions and snapshot always give the same candidates.
 */
export class IngredientResolver {
  private readonly alternatives: number
  private readonly createIndex: CatalogIndexFactory

  constructor(private readonly options: ResolverOptions) {
    this.alternatives = options.alternatives ?? 3
    this.createIndex = options.createIndex ?? linearCatalogIndex
  }

  /** Best similarity between a mention's key and an entry's key or alias keys. */
  scoreEntry(key: string, entry: MasterIngredientEntry): number {
    let best = similarity(key, entry.normalizedKey)
    for (const alias of entry.aliasKeys) best = Math.max(best, similarity(key, alias))
    return best
  }

  resolve(
    mentions: readonly RawIngredientMention[],
    catalogSnapshot: readonly MasterIngredientEntry[],
  ): IngredientMatchCandidate[] {
    const index = this.createIndex(catalogSnapshot)
    return mentions.map((mention) => this.resolveOne(mention, index.candidatesFor(normalizeIngredientName(mention.text))))
  }

  private resolveOne(mention: RawIngredientMention, entries: Iterable<MasterIngredientEntry>): IngredientMatchCandidate {
    const key = normalizeIngredientName(mention.text)
    const ranked: RankedCandidate[] = []
    for (const entry of entries) {
      ranked.push({ entryId: entry.id, canonicalName: entry.canonicalName, score: this.scoreEntry(key, entry) })
    }
    ranked.sort(byRank)

    const top = ranked[0]
    const alternatives = ranked.slice(0, this.alternatives)
    const proposedName = mention.text.trim()

    if (top && top.score >= this.options.autoAcceptThreshold) {
      return { mentionId: mention.id, entryId: top.entryId, score: top.score, decision: 'auto-accepted', alternatives, proposedName }
    }
    if (top && top.score >= this.options.reviewThreshold) {
      return { mentionId: mention.id, entryId: top.entryId, score: top.score, decision: 'needs-review', alternatives, proposedName }
    }
    return {
      mentionId: mention.id,
      entryId: null,
      score: top ? top.score : 0,
      decision: 'needs-review',
      alternatives,
      proposedName,
    }
  }
}
