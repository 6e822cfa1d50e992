export interface Range {
  min: number
  max: number
}

/** A single ingredient reference extracted from one raw source line. */
export interface RawIngredientMention {
  id: string
  raw: string
  text: string
  quantity: number | Range | null
  unit: string | null
  prep: string | null
  notes: string | null
  optional: boolean
}
