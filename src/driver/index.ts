/**
 * Driver Module Exports
 */

export { Driver, createDriver, GraphDatabase, DEFAULT_USER_AGENT } from './driver'
export { Session } from './session'
export type { SessionOptions, TransactionSlot, TransitionResult } from './session'
export { Transaction } from './transaction'
export type { TransactionState } from './transaction'
export { BenchTest, BENCH_TEST_MARKS } from './bench-test'
export type { Latency, BenchTestMark } from './bench-test'
export { parseUri, DEFAULT_PORT, SUPPORTED_SCHEMES } from './uri'
