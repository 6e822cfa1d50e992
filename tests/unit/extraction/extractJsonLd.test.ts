import { describe, it, expect } from 'vitest'
import { extractJsonLd } from '@application/extraction/extractJsonLd.ts'
import { schemaRecipeFields } from '@application/extraction/schemaRecipeFields.ts'

const GRAPH_PAGE = `
<html><head>
<script type="application/ld+json">{"@type":"WebSite","name":"Cooking Site"}</script>
<script type="application/ld+json">
{"@context":"https://schema.org","@graph":[
  {"@type":"WebPage","name":"Page"},
  {"@type":["Recipe","HowTo"],
   "name":"Garlic Pasta &amp; Oil",
   "recipeIngredient":["200 g spaghetti","3 cloves garlic, sliced"],
   "recipeInstructions":[{"@type":"HowToSection","name":"Cook","itemListElement":[
     {"@type":"HowToStep","text":"Boil the pasta."},
     {"@type":"HowToStep","text":"Fry the garlic."}]}],
   "recipeYield":"4 servings",
   "prepTime":"PT10M",
   "cookTime":"PT15M",
   "recipeCategory":"Primo",
   "image":{"@type":"ImageObject","url":"https://example.com/pasta.jpg"}}
]}
</script>
</head><body></body></html>`

describe('extractJsonLd', () => {
  it('should find a Recipe with array @type inside @graph', () => {
    const recipes = extractJsonLd(GRAPH_PAGE)
    expect(recipes).toHaveLength(1)
    expect(recipes[0].name).toBe('Garlic Pasta &amp; Oil')
  })

  it('should skip broken blocks and keep valid ones', () => {
    const html = `
      <script type="application/ld+json">{invalid json}</script>
      <script type="application/ld+json">{"@type":"Recipe","name":"Found It"}</script>
    `
    expect(extractJsonLd(html).map((r) => r.name)).toEqual(['Found It'])
  })

  it('should return an empty array when no Recipe is present', () => {
    expect(extractJsonLd('<html><body>No recipe here</body></html>')).toEqual([])
  })
})

describe('schemaRecipeFields', () => {
  const [recipe] = extractJsonLd(GRAPH_PAGE)
  const { fields, fieldConfidence } = schemaRecipeFields(recipe, 1)

  it('should decode entities in the title', () => {
    expect(fields.title).toBe('Garlic Pasta & Oil')
  })

  it('should parse ingredients into mentions', () => {
    expect(fields.ingredients?.map((m) => [m.id, m.text, m.unit, m.prep])).toEqual([
      ['ing_1', 'spaghetti', 'gram', null],
      ['ing_2', 'garlic', 'clove', 'sliced'],
    ])
  })

  it('should flatten HowToSection steps', () => {
    expect(fields.instructions).toEqual([
      { id: 'step_1', order: 1, text: 'Boil the pasta.' },
      { id: 'step_2', order: 2, text: 'Fry the garlic.' },
    ])
  })

  it('should read yield, times, course and image', () => {
    expect(fields.servings).toBe(4)
    expect(fields.prepTimeMinutes).toBe(10)
    expect(fields.cookTimeMinutes).toBe(15)
    expect(fields.courseCategory).toBe('first-course')
    expect(fields.imageUrl).toBe('https://example.com/pasta.jpg')
  })

  it('should score every present field at the base confidence', () => {
    expect(fieldConfidence).toEqual({
      title: 1,
      'ingredient:ing_1': 1,
      'ingredient:ing_2': 1,
      'instruction:step_1': 1,
      'instruction:step_2': 1,
      servings: 1,
      prepTimeMinutes: 1,
      cookTimeMinutes: 1,
      courseCategory: 1,
      imageUrl: 1,
    })
  })

  it('should split a single instructions string on newlines and drop numbering', () => {
    const { fields: parsed } = schemaRecipeFields(
      { '@type': 'Recipe', name: 'Tea', recipeInstructions: '1. Boil water.\n2. Steep the tea.' },
      0.9,
    )
    expect(parsed.instructions?.map((s) => s.text)).toEqual(['Boil water.', 'Steep the tea.'])
    expect(parsed.ingredients).toBeUndefined()
  })
})
