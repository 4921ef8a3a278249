/**
 * SpendWise core: statement ingestion, period summaries, saving tips and
 * spending forecasts. Every function is pure; callers pass the transaction
 * set and selections in explicitly.
 */

export * from './ingest/index.js'
export * from './reporting/index.js'
export * from './tips/index.js'
export * from './forecast/index.js'
