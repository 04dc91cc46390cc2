import type { AppConfig, UpdateInfo } from '../types'
import { describeError } from './errors'

export interface UpdateCheckInput {
  repo: string
  currentVersion: string
  endpoint?: string
}

const GITHUB_API = 'https://api.github.com'

export const latestReleaseEndpoint = (repo: string): string => `${GITHUB_API}/repos/${repo}/releases/latest`

export const releasePageUrl = (repo: string): string => `https://github.com/${repo}/releases/latest`

const normalizeVersion = (version: string): string => version.trim().replace(/^v/i, '')

/** Dot-separated comparison; numeric segments compare as numbers, anything else as text. */
export const compareVersions = (left: string, right: string): number => {
  const leftParts = normalizeVersion(left).split('.')
  const rightParts = normalizeVersion(right).split('.')
  const length = Math.max(leftParts.length, rightParts.length)

  for (let index = 0; index < length; index += 1) {
    const a = leftParts[index] ?? '0'
    const b = rightParts[index] ?? '0'
    const numericA = /^\d+$/.test(a) ? Number(a) : null
    const numericB = /^\d+$/.test(b) ? Number(b) : null

    if (numericA !== null && numericB !== null) {
      if (numericA !== numericB) {
        return numericA > numericB ? 1 : -1
      }
      continue
    }

    const textual = a.localeCompare(b)
    if (textual !== 0) {
      return textual > 0 ? 1 : -1
    }
  }

  return 0
}

const readTagName = (payload: unknown): string => {
  if (!payload || typeof payload !== 'object') {
    throw new Error('Unexpected release response shape.')
  }

  const candidate = payload as { tag_name?: unknown }
  if (typeof candidate.tag_name !== 'string' || !candidate.tag_name.trim()) {
    throw new Error('Release response did not include a tag name.')
  }

  return normalizeVersion(candidate.tag_name)
}

export const checkForUpdate = async (input: UpdateCheckInput): Promise<UpdateInfo | null> => {
  const response = await fetch(input.endpoint ?? latestReleaseEndpoint(input.repo), {
    headers: { Accept: 'application/vnd.github+json' },
  })

  const responseBody = await response.text()
  if (!response.ok) {
    throw new Error(`Update check failed (${response.status}): ${responseBody.slice(0, 200)}`)
  }

  const latestVersion = readTagName(JSON.parse(responseBody) as unknown)
  if (compareVersions(latestVersion, input.currentVersion) <= 0) {
    return null
  }

  return { latestVersion, releaseUrl: releasePageUrl(input.repo) }
}

/**
 * Runs the update check off to the side of the session. Resolves once the
 * check has finished or failed; failures are logged and otherwise ignored.
 */
export const startUpdateCheck = async (
  config: Pick<AppConfig, 'checkForUpdates' | 'updateRepo' | 'currentVersion'>,
  onUpdate: (update: UpdateInfo) => void,
): Promise<void> => {
  if (!config.checkForUpdates || !config.updateRepo) {
    return
  }

  try {
    const update = await checkForUpdate({ repo: config.updateRepo, currentVersion: config.currentVersion })
    if (update) {
      onUpdate(update)
    }
  } catch (error) {
    console.warn(`[updates] Error checking for updates: ${describeError(error)}`)
  }
}
