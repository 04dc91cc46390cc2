import type { Recipe, RecipeFields } from '../types'
import { fail, ok } from './errors'
import type { Result } from './errors'

/**
 * Insertion-ordered recipe collection keyed by exact name.
 *
 * The store never writes to disk; callers save after each confirmed change.
 */
export class RecipeStore {
  private recipes: Recipe[] = []

  get size(): number {
    return this.recipes.length
  }

  list(): readonly Recipe[] {
    return this.recipes
  }

  find(name: string): Recipe | undefined {
    return this.recipes.find((recipe) => recipe.name === name)
  }

  has(recipe: Recipe): boolean {
    return this.recipes.includes(recipe)
  }

  add(recipe: Recipe): Result<Recipe> {
    if (this.find(recipe.name)) {
      return fail('DuplicateName', 'A recipe with this name already exists!')
    }

    this.recipes.push(recipe)
    return ok(recipe)
  }

  // Renames are accepted as-is: the new name is not checked against the others.
  update(existing: Recipe, fields: RecipeFields): Result<Recipe> {
    if (!this.has(existing)) {
      return fail('NotFound', `Recipe "${existing.name}" was not found.`)
    }

    existing.name = fields.name
    existing.ingredients = fields.ingredients
    existing.instructions = fields.instructions
    existing.servings = fields.servings
    return ok(existing)
  }

  remove(recipe: Recipe): Result<Recipe> {
    const index = this.recipes.indexOf(recipe)
    if (index < 0) {
      return fail('NotFound', `Recipe "${recipe.name}" was not found.`)
    }

    this.recipes.splice(index, 1)
    return ok(recipe)
  }

  replaceAll(recipes: Recipe[]): void {
    this.recipes = [...recipes]
  }

  countByName(name: string): number {
    return this.recipes.filter((recipe) => recipe.name === name).length
  }
}
