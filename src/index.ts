/**
 * graphwire - session layer for Bolt graph database servers
 *
 * Pipelines statements over a single connection, groups them into
 * transactions and returns typed, read-only records.
 */

export { auth } from './auth'
export type { AuthToken } from './auth'

export {
  createDriver as driver,
  Driver,
  GraphDatabase,
  Session,
  Transaction,
  BenchTest,
  parseUri,
} from './driver'
export type { Latency, TransactionState, SessionOptions } from './driver'

export { Record } from './result'

export { Response, BoltConnection, connect } from './connection'
export type { Connection, Request, ResponseMessage, TerminalMessage, Metadata } from './connection'

export { Structure, pack, unpack } from './packstream'

export { hydrate } from './types/hydration'
export { Node, Relationship, UnboundRelationship, Path } from './types'
export type {
  Config,
  SessionConfig,
  LoggingConfig,
  LogLevel,
  Hydrator,
  Connector,
  ConnectOptions,
  ServerAddress,
  ParsedUri,
  Parameters,
} from './types'

export { createLogger } from './logging'
export type { Logger } from './logging'

export {
  GraphwireError,
  UnsupportedSchemeError,
  InvalidUriError,
  ConfigurationError,
  QueryFailureError,
  InvariantViolationError,
  FieldNotFoundError,
  IndexTypeError,
  ProtocolError,
  ServiceUnavailableError,
} from './errors'

export { VERSION } from './version'
