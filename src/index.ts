import { readConfig } from './config/env'
import { RecipeSession } from './session'
import type { AppConfig, UpdateInfo } from './types'
import { JsonFileStorage } from './utils/storage'
import { startUpdateCheck } from './utils/updateCheck'

export { default as RecipeManager } from './App'
export { APP_VERSION, readConfig, resolveDataDir } from './config/env'
export { RecipeSession } from './session'
export type { AppConfig, IngredientLine, Recipe, RecipeFields, RecipeSummary, UpdateInfo } from './types'
export { RecipeError } from './utils/errors'
export type { RecipeErrorKind, Result } from './utils/errors'
export { parseIngredientLine, scaleFactor, scaleIngredientText, validateRecipeFields } from './utils/recipeEngine'
export { RecipeStore } from './utils/recipeStore'
export { JsonFileStorage } from './utils/storage'
export type { LoadOutcome, RecipeStorage } from './utils/storage'
export { checkForUpdate, compareVersions, startUpdateCheck } from './utils/updateCheck'

export const openDefaultSession = (config: AppConfig = readConfig()): RecipeSession =>
  RecipeSession.open(new JsonFileStorage(config.recipesFile))

/**
 * Opens the session first, then starts the optional update check beside it.
 * `updateCheck` settles once the check is done and never rejects.
 */
export const launchRecipeBox = (
  onUpdate: (update: UpdateInfo) => void,
  config: AppConfig = readConfig(),
): { session: RecipeSession; updateCheck: Promise<void> } => {
  const session = openDefaultSession(config)
  const updateCheck = startUpdateCheck(config, onUpdate)
  return { session, updateCheck }
}
