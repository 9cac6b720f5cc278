/**
 * Driver
 * Entry point for opening sessions against a Bolt server
 */

import { connect as boltConnect } from '../connection/bolt-connection'
import { ConfigurationError, InvariantViolationError } from '../errors'
import { createLogger, isLogLevel, LOG_LEVELS } from '../logging'
import type { Logger } from '../logging'
import { hydrate as defaultHydrate } from '../types/hydration'
import { VERSION } from '../version'
import type {
  AuthToken,
  Config,
  Connector,
  Hydrator,
  ParsedUri,
  SessionConfig,
} from '../types'
import { Session } from './session'
import { parseUri } from './uri'

export const DEFAULT_USER_AGENT = `graphwire/${VERSION}`

type DriverState = 'open' | 'closed'

function validateConfig(config: Config): void {
  if (config.userAgent !== undefined && (typeof config.userAgent !== 'string' || config.userAgent.trim() === '')) {
    throw new ConfigurationError('userAgent must be a non-empty string')
  }
  if (config.logging !== undefined) {
    if (!isLogLevel(config.logging.level)) {
      throw new ConfigurationError(
        `logging.level must be one of ${LOG_LEVELS.join(', ')}, got "${String(config.logging.level)}"`
      )
    }
    if (config.logging.logger !== undefined && typeof config.logging.logger !== 'function') {
      throw new ConfigurationError('logging.logger must be a function')
    }
  }
  if (config.connect !== undefined && typeof config.connect !== 'function') {
    throw new ConfigurationError('connect must be a function')
  }
  if (config.hydrate !== undefined && typeof config.hydrate !== 'function') {
    throw new ConfigurationError('hydrate must be a function')
  }
}

/**
 * Driver - accessor for one graph database server. Each session gets a
 * freshly opened connection of its own; connections are never shared.
 */
export class Driver {
  private _state: DriverState = 'open'
  private readonly _uri: string
  private readonly _parsedUri: ParsedUri
  private readonly _authToken?: AuthToken
  private readonly _userAgent: string
  private readonly _connect: Connector
  private readonly _hydrate: Hydrator
  private readonly _config: Config
  private readonly _logger: Logger

  /**
   * Parses the URI and validates the configuration; no connection is opened.
   *
   * @throws UnsupportedSchemeError for any scheme other than bolt
   */
  constructor(uri: string, authToken?: AuthToken, config: Config = {}) {
    this._uri = uri
    this._parsedUri = parseUri(uri)
    validateConfig(config)

    this._authToken = authToken
    this._config = { ...config }
    this._userAgent = config.userAgent ?? DEFAULT_USER_AGENT
    this._connect = config.connect ?? boltConnect
    this._hydrate = config.hydrate ?? defaultHydrate
    this._logger = createLogger(config.logging)
  }

  /**
   * Open a new connection and wrap it in a session
   */
  async session(config: SessionConfig = {}): Promise<Session> {
    if (this._state !== 'open') {
      throw new InvariantViolationError('Cannot create session on closed driver')
    }

    const { host, port } = this._parsedUri
    const connection = await this._connect(
      { host, port },
      {
        userAgent: this._userAgent,
        authToken: this._authToken,
        logging: this._config.logging,
      }
    )
    this._logger.debug(`Session opened to ${host}:${port}`)

    return new Session(connection, {
      hydrate: config.hydrate ?? this._hydrate,
      logger: this._logger,
    })
  }

  /**
   * Stop handing out sessions. Sessions already open keep their connections
   * until they are closed.
   */
  async close(): Promise<void> {
    this._state = 'closed'
  }

  get uri(): string {
    return this._uri
  }

  get host(): string {
    return this._parsedUri.host
  }

  get port(): number {
    return this._parsedUri.port
  }

  /**
   * Get the parsed URI components
   */
  get parsedUri(): ParsedUri {
    return { ...this._parsedUri }
  }

  get userAgent(): string {
    return this._userAgent
  }

  get isOpen(): boolean {
    return this._state === 'open'
  }
}

/**
 * Create a new Driver instance
 */
export function createDriver(uri: string, authToken?: AuthToken, config?: Config): Driver {
  return new Driver(uri, authToken, config)
}

/**
 * Access to graph database functionality, primarily driver construction:
 *
 *     const driver = GraphDatabase.driver('bolt://localhost')
 */
export const GraphDatabase = {
  driver: createDriver,
}
