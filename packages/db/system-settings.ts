/**
 * Runtime switches stored in the system_settings table, with env var override.
 */

import { createLogger } from '@searchlight/logger'
import { query } from './client'

const log = createLogger('db').child('settings')

// =============================================================================
// Setting Keys
// =============================================================================

export const SETTING_KEYS = {
  MAINTENANCE_MODE: 'MAINTENANCE_MODE',
  AI_SEARCH_ENABLED: 'AI_SEARCH_ENABLED',
} as const

export type SettingKey = typeof SETTING_KEYS[keyof typeof SETTING_KEYS]

const DEFAULTS: Record<SettingKey, boolean> = {
  [SETTING_KEYS.MAINTENANCE_MODE]: false,
  [SETTING_KEYS.AI_SEARCH_ENABLED]: true,
}

// =============================================================================
// Cache for settings (refresh every 60 seconds)
// =============================================================================

interface CachedSetting {
  value: boolean
  timestamp: number
}

const cache = new Map<SettingKey, CachedSetting>()
const CACHE_TTL_MS = 60_000

// =============================================================================
// Public API
// =============================================================================

/**
 * Get a boolean setting value (env var wins over the table)
 */
export async function getBooleanSetting(key: SettingKey): Promise<boolean> {
  const envValue = process.env[key]
  if (envValue === 'true') return true
  if (envValue === 'false') return false

  return getSettingValue(key)
}

export const isMaintenanceMode = () => getBooleanSetting(SETTING_KEYS.MAINTENANCE_MODE)
export const isAiSearchEnabled = () => getBooleanSetting(SETTING_KEYS.AI_SEARCH_ENABLED)

/**
 * Clear the settings cache (useful after updates)
 */
export function clearSettingsCache(): void {
  cache.clear()
}

// =============================================================================
// Internal
// =============================================================================

async function getSettingValue(key: SettingKey): Promise<boolean> {
  const cached = cache.get(key)
  if (cached && Date.now() - cached.timestamp < CACHE_TTL_MS) {
    return cached.value
  }

  try {
    const rows = await query<{ value: unknown }>('SELECT value FROM system_settings WHERE key = $1', [key])
    const stored = rows[0]?.value
    const value = typeof stored === 'boolean' ? stored : DEFAULTS[key]

    cache.set(key, { value, timestamp: Date.now() })
    return value
  } catch (error) {
    // Not cached, so the next call retries the table
    log.error('Failed to read setting, using default', { key, fallback: DEFAULTS[key] }, error)
    return DEFAULTS[key]
  }
}
