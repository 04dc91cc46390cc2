import type { Recipe, RecipeFields, RecipeSummary } from './types'
import { fail, ok } from './utils/errors'
import type { RecipeError, Result } from './utils/errors'
import { scaleFactor, scaleIngredientText, toSummary, validateRecipeFields } from './utils/recipeEngine'
import { RecipeStore } from './utils/recipeStore'
import type { RecipeStorage } from './utils/storage'

/**
 * The application's recipe collection together with the storage it was
 * loaded from. One instance per running app; the presentation layer gets it
 * by reference and drives every change through it.
 */
export class RecipeSession {
  readonly store: RecipeStore
  readonly loadError?: RecipeError

  private constructor(
    private readonly storage: RecipeStorage,
    store: RecipeStore,
    loadError?: RecipeError,
  ) {
    this.store = store
    this.loadError = loadError
  }

  static open(storage: RecipeStorage): RecipeSession {
    const outcome = storage.load()
    const store = new RecipeStore()
    store.replaceAll(outcome.recipes)
    return new RecipeSession(storage, store, outcome.error)
  }

  listRecipes(): RecipeSummary[] {
    return this.store.list().map(toSummary)
  }

  getRecipe(name: string): Result<Recipe> {
    const recipe = this.store.find(name)
    return recipe ? ok(recipe) : fail('NotFound', `Recipe "${name}" was not found.`)
  }

  /**
   * Adds a new recipe, or edits `existingName` in place when given. The
   * collection is saved after a successful change; if that save fails the
   * change stays in memory and the write error is returned.
   */
  createOrUpdateRecipe(fields: RecipeFields, existingName?: string): Result<Recipe> {
    const validated = validateRecipeFields(fields)
    if (!validated.ok) {
      return validated
    }

    let changed: Result<Recipe>
    if (existingName === undefined) {
      changed = this.store.add(validated.value)
    } else {
      const existing = this.getRecipe(existingName)
      if (!existing.ok) {
        return existing
      }
      changed = this.store.update(existing.value, validated.value)
      if (changed.ok && this.store.countByName(changed.value.name) > 1) {
        console.warn(`[session] "${existingName}" was renamed to "${changed.value.name}", which another recipe already uses`)
      }
    }

    if (!changed.ok) {
      return changed
    }

    const saved = this.saveRecipes()
    return saved.ok ? changed : saved
  }

  deleteRecipe(name: string): Result<Recipe> {
    const existing = this.getRecipe(name)
    if (!existing.ok) {
      return existing
    }

    const removed = this.store.remove(existing.value)
    if (!removed.ok) {
      return removed
    }

    const saved = this.saveRecipes()
    return saved.ok ? removed : saved
  }

  /**
   * Rescales `ingredientText` (the stored ingredients by default) from the
   * recipe's current serving count to `newServings` and records the new
   * count on the recipe. Nothing is saved.
   */
  scaleRecipe(name: string, newServings: number, ingredientText?: string): Result<string> {
    const existing = this.getRecipe(name)
    if (!existing.ok) {
      return existing
    }

    const recipe = existing.value
    const factor = scaleFactor(recipe.servings, newServings)
    if (!factor.ok) {
      return factor
    }

    const scaled = scaleIngredientText(ingredientText ?? recipe.ingredients, factor.value)
    recipe.servings = newServings
    return ok(scaled)
  }

  saveRecipes(): Result<void> {
    return this.storage.save(this.store.list())
  }
}
