/**
 * Core types for the label-sweep library
 *
 * Re-exports all types from domain-specific files in types/.
 */

export * from './types/index'
