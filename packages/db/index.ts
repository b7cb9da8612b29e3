export { getPool, getPoolConfig, query, withTransaction, pingDatabase, closePool } from './client'
export type { TransactionOptions, TransactionQuery } from './client'
export {
  SETTING_KEYS,
  getBooleanSetting,
  isMaintenanceMode,
  isAiSearchEnabled,
  clearSettingsCache,
} from './system-settings'
export type { SettingKey } from './system-settings'
