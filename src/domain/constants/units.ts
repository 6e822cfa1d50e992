import unitTable from './units.json'

/** Maps every unit spelling (lowercase) to its canonical form. */
export const UNIT_MAP: Readonly<Record<string, string>> = Object.fromEntries(
  Object.entries(unitTable.aliases).flatMap(([canonical, spellings]) =>
    spellings.map((spelling) => [spelling, canonical] as const),
  ),
)

/** Weight conversions to grams (base unit). */
export const WEIGHT_TO_G: Readonly<Record<string, number>> = unitTable.gramsPerUnit
