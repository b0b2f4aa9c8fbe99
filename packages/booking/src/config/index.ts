export * from './schema'
export { loadBookingConfig, API_KEY_ENV, DEFAULT_CONFIG_FILE, type LoadConfigOptions } from './loader'
export { createProviderFromConfig } from './provider-factory'
