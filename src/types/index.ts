/**
 * Driver Types
 * Configuration and shared shapes used across the driver
 */

import type { Connection } from '../connection/connection'

export { Node, Relationship, UnboundRelationship, Path } from './graph'
export type { PathSegment } from './graph'

// Auth token types
export interface AuthToken {
  scheme: string
  principal?: string
  credentials?: string
  realm?: string
  parameters?: Record<string, unknown>
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

// Logging configuration
export interface LoggingConfig {
  level: LogLevel
  logger?: (level: LogLevel, message: string) => void
}

/**
 * Converts one raw wire value into its native representation
 */
export type Hydrator = (value: unknown) => unknown

// Host and port of the server a connection is opened to
export interface ServerAddress {
  host: string
  port: number
}

// Options handed to a connector when a session opens its connection
export interface ConnectOptions {
  userAgent: string
  authToken?: AuthToken
  logging?: LoggingConfig
}

/**
 * Opens a ready-to-use connection to a server
 */
export type Connector = (address: ServerAddress, options: ConnectOptions) => Promise<Connection>

// Driver configuration
export interface Config {
  logging?: LoggingConfig
  userAgent?: string
  connect?: Connector
  hydrate?: Hydrator
}

// Session configuration
export interface SessionConfig {
  hydrate?: Hydrator
}

// Parsed URI
export interface ParsedUri {
  scheme: string
  host: string
  port: number
}

// Query parameters
export type Parameters = Record<string, unknown>

// Record type
export interface RecordShape {
  [key: string]: unknown
}
