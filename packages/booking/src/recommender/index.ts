export * from './recommender'
