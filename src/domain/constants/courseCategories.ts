export const COURSE_CATEGORIES = [
  'appetizer',
  'first-course',
  'main-course',
  'side-dish',
  'dessert',
  'one-dish-meal',
  'other',
] as const

export type CourseCategory = (typeof COURSE_CATEGORIES)[number]

/** Labels seen in schema.org recipeCategory values and handwritten cards. */
const CATEGORY_LABELS: Record<string, CourseCategory> = {
  appetizer: 'appetizer',
  appetizers: 'appetizer',
  starter: 'appetizer',
  starters: 'appetizer',
  antipasto: 'appetizer',
  antipasti: 'appetizer',
  'first course': 'first-course',
  primo: 'first-course',
  primi: 'first-course',
  pasta: 'first-course',
  soup: 'first-course',
  'main course': 'main-course',
  'main dish': 'main-course',
  main: 'main-course',
  dinner: 'main-course',
  entree: 'main-course',
  secondo: 'main-course',
  secondi: 'main-course',
  'side dish': 'side-dish',
  side: 'side-dish',
  sides: 'side-dish',
  contorno: 'side-dish',
  contorni: 'side-dish',
  dessert: 'dessert',
  desserts: 'dessert',
  dolce: 'dessert',
  dolci: 'dessert',
  'one-dish meal': 'one-dish-meal',
  'one dish meal': 'one-dish-meal',
  'piatto unico': 'one-dish-meal',
  other: 'other',
  altro: 'other',
}

export function isCourseCategory(value: string): value is CourseCategory {
  return COURSE_CATEGORIES.some((category) => category === value)
}

/** Map free-form category labels to a course, first recognised label wins. */
export function toCourseCategory(labels: readonly string[]): CourseCategory | null {
  for (const label of labels) {
    const key = label.toLowerCase().trim().replace(/\s+/g, ' ')
    if (isCourseCategory(key)) return key
    if (Object.hasOwn(CATEGORY_LABELS, key)) return CATEGORY_LABELS[key]
  }
  return null
}
