/**
 * Type manipulations used throughout the packages
 */

/**
 * Type that is either the value or undefined
 */
export type Optional<T> = T | undefined
