import type { IngredientLine, Recipe, RecipeFields, RecipeSummary } from '../types'
import { fail, ok } from './errors'
import type { Result } from './errors'

// A leading quantity is digits, optionally negative, once '.' and ',' are stripped.
const QUANTITY_PATTERN = /^-?\d+$/

export const MAX_SERVINGS = 100

export const parseIngredientLine = (line: string): IngredientLine => {
  const text = line.trim()
  const [first, ...rest] = text.split(/\s+/)
  if (!first) {
    return { kind: 'text', text }
  }

  if (!QUANTITY_PATTERN.test(first.replace(/[.,]/g, ''))) {
    return { kind: 'text', text }
  }

  // '.' stays a decimal point, ',' is a thousands separator.
  const amount = Number(first.replace(/,/g, ''))
  if (!Number.isFinite(amount)) {
    return { kind: 'text', text }
  }

  return { kind: 'quantity', amount, rest }
}

/**
 * Two decimal places. A value exactly halfway between two hundredths rounds
 * to the even one, and negative values (including -0) keep their sign.
 */
export const formatQuantity = (value: number): string => {
  const sign = value < 0 || Object.is(value, -0) ? '-' : ''
  const magnitude = Math.abs(value)

  // Only an odd number of eighths lands exactly on a half hundredth.
  const eighths = magnitude * 8
  if (Number.isSafeInteger(eighths) && eighths % 2 === 1) {
    const lower = Math.floor(magnitude * 100)
    const hundredths = lower % 2 === 0 ? lower : lower + 1
    return `${sign}${Math.floor(hundredths / 100)}.${String(hundredths % 100).padStart(2, '0')}`
  }

  return `${sign}${magnitude.toFixed(2)}`
}

export const formatIngredientLine = (line: IngredientLine, factor: number): string => {
  if (line.kind === 'text') {
    return line.text
  }

  return `${formatQuantity(line.amount * factor)} ${line.rest.join(' ')}`
}

/**
 * Multiplies the leading quantity of every ingredient line by `factor`.
 *
 * Blank lines are dropped. Lines without a recognizable leading number
 * (including fractions such as `1/2`) come back trimmed but otherwise unchanged.
 */
export const scaleIngredientText = (ingredientText: string, factor: number): string =>
  ingredientText
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line) => formatIngredientLine(parseIngredientLine(line), factor))
    .join('\n')

export const scaleFactor = (originalServings: number, newServings: number): Result<number> => {
  if (originalServings <= 0) {
    return fail('InvalidServings', 'Original recipe must have at least 1 serving!')
  }

  if (!Number.isInteger(newServings) || newServings < 1) {
    return fail('ValidationError', 'New serving count must be a whole number of at least 1.')
  }

  return ok(newServings / originalServings)
}

export const validateRecipeFields = (fields: RecipeFields): Result<Recipe> => {
  const name = fields.name.trim()
  const ingredients = fields.ingredients.trim()
  const instructions = fields.instructions.trim()

  if (!name) {
    return fail('ValidationError', 'Recipe name cannot be empty!')
  }

  if (!ingredients) {
    return fail('ValidationError', 'Ingredients cannot be empty!')
  }

  if (!instructions) {
    return fail('ValidationError', 'Instructions cannot be empty!')
  }

  if (fields.servings <= 0) {
    return fail('ValidationError', 'Servings must be greater than 0!')
  }

  if (!Number.isInteger(fields.servings)) {
    return fail('ValidationError', 'Servings must be a whole number!')
  }

  return ok({ name, ingredients, instructions, servings: fields.servings })
}

export const toSummary = (recipe: Recipe): RecipeSummary => ({
  name: recipe.name,
  servings: recipe.servings,
})

export const isRecipeRecord = (value: unknown): value is Recipe => {
  if (!value || typeof value !== 'object') {
    return false
  }

  const candidate = value as Partial<Recipe>
  return (
    typeof candidate.name === 'string' &&
    typeof candidate.ingredients === 'string' &&
    typeof candidate.instructions === 'string' &&
    typeof candidate.servings === 'number' &&
    Number.isFinite(candidate.servings)
  )
}
