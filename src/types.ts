/**
 * Core types for the address mapper library
 *
 * Re-exports all types from domain-specific files in types/.
 */

export * from './types/index'
