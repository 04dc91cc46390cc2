import fs from 'node:fs'
import path from 'node:path'
import type { Recipe } from '../types'
import { RecipeError, describeError, fail, ok } from './errors'
import type { Result } from './errors'
import { isRecipeRecord } from './recipeEngine'

const REPLACE_NOTICE = 'Saving will replace the stored recipes.'

const unreadable = (message: string, cause?: unknown): RecipeError =>
  new RecipeError('StorageReadError', `${message} ${REPLACE_NOTICE}`, cause === undefined ? undefined : { cause })

export interface LoadOutcome {
  recipes: Recipe[]
  error?: RecipeError
}

export interface RecipeStorage {
  load(): LoadOutcome
  save(recipes: readonly Recipe[]): Result<void>
}

const toRecord = (recipe: Recipe): Recipe => ({
  name: recipe.name,
  ingredients: recipe.ingredients,
  instructions: recipe.instructions,
  servings: recipe.servings,
})

export const parseRecipeDocument = (raw: string): Result<Recipe[]> => {
  if (!raw.trim()) {
    return ok([])
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    return fail('StorageReadError', `Error loading recipes: ${describeError(error)}`, error)
  }

  if (!Array.isArray(parsed)) {
    return fail('StorageReadError', 'Error loading recipes: expected a list of recipes.')
  }

  const recipes: Recipe[] = []
  for (const [index, entry] of parsed.entries()) {
    if (!isRecipeRecord(entry)) {
      return fail('StorageReadError', `Error loading recipes: entry ${index + 1} is not a valid recipe.`)
    }
    recipes.push(toRecord(entry))
  }

  return ok(recipes)
}

export const dropDuplicateNames = (recipes: Recipe[], source: string): Recipe[] => {
  const seen = new Set<string>()
  return recipes.filter((recipe) => {
    if (seen.has(recipe.name)) {
      console.warn(`[storage] dropping duplicate recipe "${recipe.name}" from ${source}`)
      return false
    }

    seen.add(recipe.name)
    return true
  })
}

/** Whole-collection JSON document on the local file system, read and written synchronously. */
export class JsonFileStorage implements RecipeStorage {
  constructor(readonly filePath: string) {}

  load(): LoadOutcome {
    if (!fs.existsSync(this.filePath)) {
      return { recipes: [] }
    }

    let raw: string
    try {
      raw = fs.readFileSync(this.filePath, 'utf8')
    } catch (error) {
      const loadError = unreadable(`Error loading recipes: ${describeError(error)}`, error)
      console.warn(`[storage] ${loadError.message}`)
      return { recipes: [], error: loadError }
    }

    const parsed = parseRecipeDocument(raw)
    if (!parsed.ok) {
      const loadError = unreadable(parsed.error.message, parsed.error.cause)
      console.warn(`[storage] ${loadError.message}`)
      return { recipes: [], error: loadError }
    }

    return { recipes: dropDuplicateNames(parsed.value, this.filePath) }
  }

  save(recipes: readonly Recipe[]): Result<void> {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true })
      fs.writeFileSync(this.filePath, JSON.stringify(recipes.map(toRecord)), 'utf8')
      return ok(undefined)
    } catch (error) {
      const message = `Error saving recipes: ${describeError(error)}`
      console.error(`[storage] ${message}`)
      return fail('StorageWriteError', message, error)
    }
  }
}
