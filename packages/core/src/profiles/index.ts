export { LoanProfileRepository } from './repository.js'
export type { LoanProfileSummary } from './repository.js'
