import type { CatalogStore } from '../catalog/catalog-store'
import type { PriceTier, Restaurant } from '../catalog/schema'
import type { UserProfile } from '../profiles/types'

export interface RecommendationRequest {
  profile?: UserProfile
  /** Cuisines of the profile's past reservations. */
  pastCuisines?: string[]
  cuisine?: string
  location?: string
  priceTier?: PriceTier
  occasion?: string
  limit?: number
}

export interface Recommendation {
  restaurant: Restaurant
  score: number
  /** Request terms the restaurant matched, in request order. */
  matched: string[]
}

export const DEFAULT_RECOMMENDATION_LIMIT = 5

const STOP_WORDS = new Set(['a', 'an', 'and', 'for', 'in', 'of', 'on', 'or', 'the', 'to', 'with', 'some', 'want'])

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((term) => term.length > 1 && !STOP_WORDS.has(term))
}

function restaurantTerms(restaurant: Restaurant): Set<string> {
  return new Set(
    tokenize(
      [
        restaurant.name,
        restaurant.cuisine,
        restaurant.location,
        ...restaurant.features,
        ...restaurant.dietaryTags,
        ...restaurant.menu.map((item) => item.name),
        ...restaurant.menu.flatMap((item) => item.dietaryTags ?? []),
      ].join(' ')
    )
  )
}

function requestTerms(request: RecommendationRequest): string[] {
  const parts = [
    request.cuisine,
    request.location,
    request.occasion,
    ...(request.profile?.dietaryPreferences ?? []),
    ...(request.pastCuisines ?? []),
  ]
  return [...new Set(parts.flatMap((part) => (part ? tokenize(part) : [])))]
}

const byScore = (a: Recommendation, b: Recommendation) =>
  b.score - a.score || b.restaurant.rating - a.restaurant.rating || a.restaurant.name.localeCompare(b.restaurant.name)

/**
 * Ranks restaurants by how many request terms their text contains.
 * A matching price tier counts as one more term. Ties, and requests with
 * no terms at all, fall back to rating, then name.
 */
export function rankRestaurants(restaurants: Restaurant[], request: RecommendationRequest): Recommendation[] {
  const terms = requestTerms(request)

  const ranked = restaurants.map((restaurant) => {
    const own = restaurantTerms(restaurant)
    const matched = terms.filter((term) => own.has(term))
    if (request.priceTier && restaurant.priceTier === request.priceTier) {
      matched.push(request.priceTier)
    }
    return { restaurant, score: matched.length, matched }
  })

  return ranked.sort(byScore).slice(0, request.limit ?? DEFAULT_RECOMMENDATION_LIMIT)
}

/**
 * Ranks the other restaurants by how many of the target's own terms they share.
 */
export function rankSimilar(
  restaurants: Restaurant[],
  target: Restaurant,
  limit = DEFAULT_RECOMMENDATION_LIMIT
): Recommendation[] {
  const terms = [...restaurantTerms(target)]

  return restaurants
    .filter((restaurant) => restaurant.id !== target.id)
    .map((restaurant) => {
      const own = restaurantTerms(restaurant)
      const matched = terms.filter((term) => own.has(term))
      return { restaurant, score: matched.length, matched }
    })
    .sort(byScore)
    .slice(0, limit)
}

export class Recommender {
  constructor(private readonly catalog: CatalogStore) {}

  async recommend(request: RecommendationRequest = {}): Promise<Recommendation[]> {
    return rankRestaurants(await this.catalog.list(), request)
  }

  /** Restaurants most like the given one. An unknown id yields nothing. */
  async similarTo(restaurantId: string, limit?: number): Promise<Recommendation[]> {
    const target = await this.catalog.get(restaurantId)
    if (!target) {
      return []
    }
    return rankSimilar(await this.catalog.list(), target, limit)
  }
}
