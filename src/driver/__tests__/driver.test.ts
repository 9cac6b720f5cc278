import { describe, it, expect, vi } from 'vitest'
import { driver, auth, GraphDatabase, Driver } from '../../index'
import { DEFAULT_USER_AGENT } from '../driver'
import { StubConnection, statementScript } from '../../__tests__/helpers/stub-connection'
import type { Connection } from '../../connection/connection'
import type { Config, ConnectOptions, ServerAddress } from '../../types'
import { ConfigurationError, InvalidUriError, UnsupportedSchemeError } from '../../errors'

function stubConnector() {
  const connections: StubConnection[] = []
  const connect = vi.fn(async (_address: ServerAddress, _options: ConnectOptions): Promise<Connection> => {
    const connection = new StubConnection(statementScript({ 'RETURN 1 AS x': { fields: ['x'], rows: [[1]] } }))
    connections.push(connection)
    return connection
  })
  return { connect, connections }
}

describe('driver()', () => {
  describe('factory function', () => {
    it('should create driver with URI only', () => {
      const d = driver('bolt://localhost')
      expect(d).toBeInstanceOf(Driver)
      expect(d.isOpen).toBe(true)
    })

    it('should create driver with URI and auth token', () => {
      const d = driver('bolt://localhost', auth.basic('neo4j', 'test-secret'))
      expect(d.uri).toBe('bolt://localhost')
    })

    it('should be reachable through GraphDatabase', () => {
      const d = GraphDatabase.driver('bolt://db.example.com:7688')
      expect(d).toBeInstanceOf(Driver)
      expect(d.host).toBe('db.example.com')
      expect(d.port).toBe(7688)
    })

    it('should throw on invalid URI format', () => {
      expect(() => driver('')).toThrow(InvalidUriError)
      expect(() => driver('invalid')).toThrow(InvalidUriError)
      expect(() => driver('://missing-scheme')).toThrow(InvalidUriError)
    })

    it('should reject every scheme other than bolt before connecting', () => {
      const { connect } = stubConnector()

      expect(() => driver('http://localhost', undefined, { connect })).toThrow(UnsupportedSchemeError)
      expect(() => driver('neo4j://localhost', undefined, { connect })).toThrow(
        'Unsupported URI scheme "neo4j". Supported schemes: bolt'
      )
      expect(connect).not.toHaveBeenCalled()
    })
  })

  describe('configuration', () => {
    it('should default the user agent', () => {
      const d = driver('bolt://localhost')
      expect(d.userAgent).toBe(DEFAULT_USER_AGENT)
      expect(DEFAULT_USER_AGENT).toMatch(/^graphwire\/\d+\.\d+\.\d+$/)
    })

    it('should accept a custom user agent', () => {
      const d = driver('bolt://localhost', undefined, { userAgent: 'reports/2.0' })
      expect(d.userAgent).toBe('reports/2.0')
    })

    it('should reject an empty user agent', () => {
      expect(() => driver('bolt://localhost', undefined, { userAgent: ' ' })).toThrow(ConfigurationError)
    })

    it('should reject an unknown log level', () => {
      const config: Config = JSON.parse('{"logging":{"level":"verbose"}}')
      expect(() => driver('bolt://localhost', undefined, config)).toThrow(
        'logging.level must be one of error, warn, info, debug, got "verbose"'
      )
    })

    it('should reject a connector that is not a function', () => {
      const config: Config = JSON.parse('{"connect":42}')
      expect(() => driver('bolt://localhost', undefined, config)).toThrow('connect must be a function')
    })
  })

  describe('session()', () => {
    it('should open a connection with the server address, user agent and auth token', async () => {
      const { connect } = stubConnector()
      const token = auth.basic('neo4j', 'test-secret')
      const d = driver('bolt://localhost', token, { connect })

      await d.session()

      expect(connect).toHaveBeenCalledTimes(1)
      expect(connect).toHaveBeenCalledWith(
        { host: 'localhost', port: 7687 },
        { userAgent: DEFAULT_USER_AGENT, authToken: token, logging: undefined }
      )
    })

    it('should give every session its own connection', async () => {
      const { connect, connections } = stubConnector()
      const d = driver('bolt://localhost', undefined, { connect })

      const first = await d.session()
      const second = await d.session()
      await first.close()

      expect(connections).toHaveLength(2)
      expect(connections[0].closed).toBe(true)
      expect(connections[1].closed).toBe(false)
      expect(second.closed).toBe(false)
    })

    it('should run statements through the opened session', async () => {
      const { connect } = stubConnector()
      const session = await driver('bolt://localhost', undefined, { connect }).session()

      const records = await session.run('RETURN 1 AS x')

      expect(records[0].get('x')).toBe(1)
    })

    it('should prefer the session hydrator over the driver hydrator', async () => {
      const { connect } = stubConnector()
      const d = driver('bolt://localhost', undefined, { connect, hydrate: () => 'driver' })

      const fromDriver = await d.session()
      const fromSession = await d.session({ hydrate: () => 'session' })

      expect((await fromDriver.run('RETURN 1 AS x'))[0].get('x')).toBe('driver')
      expect((await fromSession.run('RETURN 1 AS x'))[0].get('x')).toBe('session')
    })

    it('should propagate connector failures', async () => {
      const connect = vi.fn(async (): Promise<Connection> => {
        throw new Error('connection refused')
      })
      const d = driver('bolt://localhost', undefined, { connect })

      await expect(d.session()).rejects.toThrow('connection refused')
    })

    it('should log opened sessions at debug level', async () => {
      const { connect } = stubConnector()
      const logger = vi.fn()
      const d = driver('bolt://localhost:7690', undefined, { connect, logging: { level: 'debug', logger } })

      await d.session()

      expect(logger).toHaveBeenCalledWith('debug', 'Session opened to localhost:7690')
    })

    it('should refuse new sessions after close', async () => {
      const { connect } = stubConnector()
      const d = driver('bolt://localhost', undefined, { connect })

      await d.close()

      expect(d.isOpen).toBe(false)
      await expect(d.session()).rejects.toThrow('Cannot create session on closed driver')
      expect(connect).not.toHaveBeenCalled()
    })
  })

  describe('auth tokens', () => {
    it('should create basic auth tokens', () => {
      expect(auth.basic('neo4j', 'test-secret')).toEqual({
        scheme: 'basic',
        principal: 'neo4j',
        credentials: 'test-secret',
      })
      expect(auth.basic('neo4j', 'test-secret', 'native')).toEqual({
        scheme: 'basic',
        principal: 'neo4j',
        credentials: 'test-secret',
        realm: 'native',
      })
    })

    it('should create a token for servers without authentication', () => {
      expect(auth.none()).toEqual({ scheme: 'none' })
    })

    it('should create custom tokens', () => {
      expect(auth.custom('user', 'test-secret', 'realm', 'ldap', { tenant: 'a' })).toEqual({
        scheme: 'ldap',
        principal: 'user',
        credentials: 'test-secret',
        realm: 'realm',
        parameters: { tenant: 'a' },
      })
    })
  })
})
