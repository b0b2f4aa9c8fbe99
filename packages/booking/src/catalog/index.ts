export * from './schema'
export * from './catalog-store'
export { loadCatalogSeed, DEFAULT_SEED_PATH } from './seed'
