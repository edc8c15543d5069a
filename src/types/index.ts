/**
 * Types Index
 *
 * Re-exports all types from domain-specific files.
 */

export * from './common'
export * from './geocoder'
export * from './input'
export * from './markers'
export * from './result'
