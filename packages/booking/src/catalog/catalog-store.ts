import { createKeyedMutex, noopLogger, type KeyedMutex, type Logger } from '@tablewise/core'
import { NotFoundError, ValidationError } from '../errors'
import { validateRestaurant, type PriceTier, type Restaurant, type RestaurantInput } from './schema'

export interface RestaurantSearch {
  cuisine?: string
  location?: string
  priceTier?: PriceTier
  features?: string[]
  dietaryTags?: string[]
  /** Free text matched against name, cuisine, location and menu item names. */
  query?: string
  limit?: number
}

/**
 * Answers whether a table still carries a booked reservation or a live hold.
 * Supplied by the ledger so that catalog edits cannot orphan a claim.
 */
export type TableInUseCheck = (restaurantId: string, tableId: string) => Promise<boolean>

export interface CatalogStore {
  list(): Promise<Restaurant[]>
  get(id: string): Promise<Restaurant | undefined>
  findByName(name: string): Promise<Restaurant | undefined>
  search(criteria: RestaurantSearch): Promise<Restaurant[]>
  upsert(restaurant: RestaurantInput): Promise<Restaurant>
}

export const DEFAULT_SEARCH_LIMIT = 10

/** Lock key for edits to one restaurant. Hold creation takes it before the table/day key. */
export function catalogKey(restaurantId: string): string {
  return `catalog:${restaurantId}`
}

const lower = (value: string) => value.trim().toLowerCase()

function includesAll(haystack: string[], needles: string[]): boolean {
  const set = new Set(haystack.map(lower))
  return needles.every((n) => set.has(lower(n)))
}

function matches(restaurant: Restaurant, criteria: RestaurantSearch): boolean {
  if (criteria.cuisine && lower(restaurant.cuisine) !== lower(criteria.cuisine)) {
    return false
  }
  if (criteria.location && lower(restaurant.location) !== lower(criteria.location)) {
    return false
  }
  if (criteria.priceTier && restaurant.priceTier !== criteria.priceTier) {
    return false
  }
  if (criteria.features?.length && !includesAll(restaurant.features, criteria.features)) {
    return false
  }
  if (criteria.dietaryTags?.length && !includesAll(restaurant.dietaryTags, criteria.dietaryTags)) {
    return false
  }
  if (criteria.query) {
    const text = [restaurant.name, restaurant.cuisine, restaurant.location, ...restaurant.menu.map((m) => m.name)]
      .join(' ')
      .toLowerCase()
    if (!text.includes(lower(criteria.query))) {
      return false
    }
  }
  return true
}

/** Highest rating first, then name. */
export function byRating(a: Restaurant, b: Restaurant): number {
  return b.rating - a.rating || a.name.localeCompare(b.name)
}

export interface InMemoryCatalogStoreOptions {
  isTableInUse?: TableInUseCheck
  /** Shared with the availability engine so an edit and a new hold never interleave. */
  locks?: KeyedMutex
  logger?: Logger
}

export class InMemoryCatalogStore implements CatalogStore {
  private readonly restaurants = new Map<string, Restaurant>()
  private isTableInUse: TableInUseCheck
  private readonly locks: KeyedMutex
  private readonly logger: Logger

  constructor(restaurants: Restaurant[] = [], options: InMemoryCatalogStoreOptions = {}) {
    for (const restaurant of restaurants) {
      this.restaurants.set(restaurant.id, restaurant)
    }
    this.isTableInUse = options.isTableInUse ?? (async () => false)
    this.locks = options.locks ?? createKeyedMutex()
    this.logger = options.logger ?? noopLogger
  }

  /** Wired after construction because the ledger itself reads the catalog. */
  setTableInUseCheck(check: TableInUseCheck): void {
    this.isTableInUse = check
  }

  async list(): Promise<Restaurant[]> {
    return [...this.restaurants.values()]
  }

  async get(id: string): Promise<Restaurant | undefined> {
    return this.restaurants.get(id)
  }

  async findByName(name: string): Promise<Restaurant | undefined> {
    const wanted = lower(name)
    for (const restaurant of this.restaurants.values()) {
      if (lower(restaurant.name) === wanted) {
        return restaurant
      }
    }
    return undefined
  }

  async search(criteria: RestaurantSearch): Promise<Restaurant[]> {
    const limit = criteria.limit ?? DEFAULT_SEARCH_LIMIT
    return [...this.restaurants.values()]
      .filter((r) => matches(r, criteria))
      .sort(byRating)
      .slice(0, limit)
  }

  /**
   * Adds or replaces a restaurant. A table that still carries a booked
   * reservation or a live hold may not be removed or lose seats.
   */
  async upsert(input: RestaurantInput): Promise<Restaurant> {
    const restaurant = validateRestaurant(input)

    return this.locks.runExclusive(catalogKey(restaurant.id), async () => {
      const existing = this.restaurants.get(restaurant.id)

      if (existing) {
        const keptTables = new Map(restaurant.tables.map((t) => [t.id, t.seats]))
        for (const table of existing.tables) {
          const seats = keptTables.get(table.id)
          if (seats !== undefined && seats >= table.seats) {
            continue
          }
          if (await this.isTableInUse(existing.id, table.id)) {
            throw new ValidationError(
              `Table '${table.id}' of '${existing.name}' has active reservations or holds`,
              { context: { restaurantId: existing.id, tableId: table.id } }
            )
          }
        }
      }

      this.restaurants.set(restaurant.id, restaurant)
      this.logger.log?.('info', `catalog ${existing ? 'updated' : 'added'} ${restaurant.id}`)
      return restaurant
    })
  }
}

/**
 * Resolves a restaurant by id, falling back to a case-insensitive name match.
 */
export async function requireRestaurant(catalog: CatalogStore, idOrName: string): Promise<Restaurant> {
  const restaurant = (await catalog.get(idOrName)) ?? (await catalog.findByName(idOrName))
  if (!restaurant) {
    throw new NotFoundError('Restaurant', idOrName)
  }
  return restaurant
}
