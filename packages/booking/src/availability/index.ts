export * from './time'
export * from './slot'
export * from './hold-book'
export * from './availability-engine'
