export * from './types'
export { InMemoryReservationRepository, type ReservationRepository } from './repository'
export { JsonFileReservationRepository, RESERVATIONS_FILE } from './json-file-repository'
export { ReservationLedger, type ReservationLedgerOptions } from './ledger'
