export * from './types'
export { normalizeIdentity, extractIdentity, type IdentityKind, type NormalizedIdentity } from './normalize'
export {
  InMemoryProfileRepository,
  JsonFileProfileRepository,
  PROFILES_FILE,
  type ProfileRepository,
} from './repository'
export { ProfileResolver, type ProfileResolverOptions } from './profile-resolver'
