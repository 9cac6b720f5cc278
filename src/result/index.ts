/**
 * Result Types
 */

export { Record } from './record'
export type { Visitor } from './record'
