import dotenv from 'dotenv'
import os from 'node:os'
import path from 'node:path'
import type { AppConfig } from '../types'

dotenv.config() // loads ./.env when present

export const APP_NAME = 'RecipeBox'
export const APP_VERSION = '1.0.0'
export const RECIPES_FILE_NAME = 'recipes.json'

type Env = Record<string, string | undefined>

const isDisabled = (value: string | undefined): boolean =>
  ['0', 'false', 'no', 'off'].includes((value ?? '').trim().toLowerCase())

export const resolveDataDir = (
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform,
  homeDir: string = os.homedir(),
): string => {
  const override = env.RECIPE_BOX_DATA_DIR?.trim()
  if (override) {
    return override
  }

  if (platform === 'win32' && env.APPDATA) {
    return path.join(env.APPDATA, APP_NAME)
  }

  const dataHome = env.XDG_DATA_HOME?.trim() || path.join(homeDir, '.local', 'share')
  return path.join(dataHome, APP_NAME)
}

export const readConfig = (
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform,
  homeDir: string = os.homedir(),
): AppConfig => {
  const dataDir = resolveDataDir(env, platform, homeDir)
  const updateRepo = env.RECIPE_BOX_UPDATE_REPO?.trim() || undefined

  return {
    dataDir,
    recipesFile: path.join(dataDir, RECIPES_FILE_NAME),
    currentVersion: APP_VERSION,
    checkForUpdates: Boolean(updateRepo) && !isDisabled(env.RECIPE_BOX_CHECK_UPDATES),
    updateRepo,
  }
}
