export interface Recipe {
  name: string
  ingredients: string
  instructions: string
  servings: number
}

export type RecipeFields = Recipe

export interface RecipeSummary {
  name: string
  servings: number
}

export type IngredientLine =
  | { kind: 'quantity'; amount: number; rest: string[] }
  | { kind: 'text'; text: string }

export interface UpdateInfo {
  latestVersion: string
  releaseUrl: string
}

export interface AppConfig {
  dataDir: string
  recipesFile: string
  currentVersion: string
  checkForUpdates: boolean
  updateRepo?: string
}
