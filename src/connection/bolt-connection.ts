/**
 * Bolt Connection
 * A Connection speaking Bolt protocol version 1 over a byte stream
 */

import { connect as netConnect } from 'node:net'
import { once } from 'node:events'
import type { Duplex } from 'node:stream'
import { ProtocolError, ServiceUnavailableError } from '../errors'
import { createLogger } from '../logging'
import type { Logger } from '../logging'
import { Packer } from '../packstream/packer'
import { unpack } from '../packstream/unpacker'
import type { ConnectOptions, ServerAddress } from '../types'
import { chunk, Dechunker } from './chunking'
import type { Connection } from './connection'
import { describeRequest, requestToStructure, structureToResponseMessage } from './messages'
import type { Request } from './messages'
import { Response } from './response'

export const BOLT_MAGIC_PREAMBLE = 0x6060b017
export const SUPPORTED_VERSIONS = [1, 0, 0, 0] as const

interface Waiter {
  resolve: (message: Uint8Array) => void
  reject: (error: Error) => void
}

/**
 * Handshake bytes: the magic preamble followed by four proposed versions
 */
export function handshakeBytes(): Uint8Array {
  const bytes = new Uint8Array(20)
  const view = new DataView(bytes.buffer)
  view.setUint32(0, BOLT_MAGIC_PREAMBLE)
  SUPPORTED_VERSIONS.forEach((version, i) => view.setUint32(4 + i * 4, version))
  return bytes
}

/**
 * BoltConnection - pipelined request/response channel over one socket
 */
export class BoltConnection implements Connection {
  readonly address: string
  private readonly _socket: Duplex
  private readonly _logger: Logger
  private readonly _packer = new Packer()
  private readonly _dechunker = new Dechunker()
  private _outbox: Uint8Array[] = []
  private readonly _responses: Response[] = []
  private readonly _inbox: Uint8Array[] = []
  private _waiter: Waiter | null = null
  private _handshakeBuffer: Uint8Array | null = new Uint8Array(0)
  private _versionWaiter: Waiter | null = null
  private _failure: Error | null = null
  private _closed = false
  private _protocolVersion = 0

  constructor(socket: Duplex, address: string, logger: Logger = createLogger()) {
    this._socket = socket
    this.address = address
    this._logger = logger

    socket.on('data', (data: Uint8Array) => this._onData(data))
    socket.on('error', (error: Error) => {
      this._fail(new ServiceUnavailableError(`Connection to ${address} failed: ${error.message}`, error))
    })
    socket.on('close', () => {
      if (!this._closed) {
        this._fail(new ServiceUnavailableError(`Connection to ${address} was closed by the server`))
      }
    })
  }

  get closed(): boolean {
    return this._closed
  }

  /**
   * True once a socket or protocol error has made the connection unusable
   */
  get defunct(): boolean {
    return this._failure !== null
  }

  get protocolVersion(): number {
    return this._protocolVersion
  }

  /**
   * Number of responses still waiting for their terminal message
   */
  get pendingResponses(): number {
    return this._responses.length
  }

  /**
   * Send the handshake and wait for the server to pick a protocol version
   */
  async handshake(): Promise<number> {
    const reply = new Promise<Uint8Array>((resolve, reject) => {
      this._versionWaiter = { resolve, reject }
    })
    const [, bytes] = await Promise.all([this._write(handshakeBytes()), reply])
    const version = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(0)
    if (version === 0) {
      const error = new ProtocolError(`Server at ${this.address} does not support any proposed protocol version`)
      this._logger.error(error.message)
      throw error
    }
    if (!SUPPORTED_VERSIONS.some((supported) => supported !== 0 && supported === version)) {
      const error = new ProtocolError(`Server at ${this.address} chose unsupported protocol version ${version}`)
      this._logger.error(error.message)
      throw error
    }
    this._protocolVersion = version
    this._logger.info(`Bolt v${version} handshake with ${this.address} completed`)
    return version
  }

  /**
   * Authenticate and announce the client, failing if the server refuses
   */
  async init(options: ConnectOptions): Promise<void> {
    const response = new Response(this)
    this.enqueue(
      { type: 'init', clientName: options.userAgent, authToken: options.authToken ?? { scheme: 'none' } },
      response
    )
    await this.flush()
    const outcome = await response.consume()
    if (outcome.type !== 'success') {
      const message = typeof outcome.metadata.message === 'string' ? outcome.metadata.message : 'INIT failed'
      await this.close()
      throw new ServiceUnavailableError(`Cannot initialise connection to ${this.address}: ${message}`)
    }
    this._logger.info(`Connection to ${this.address} initialised as ${options.userAgent}`)
  }

  enqueue(request: Request, response: Response): void {
    this._assertUsable()
    this._packer.reset()
    this._packer.pack(requestToStructure(request))
    this._outbox.push(chunk(this._packer.toBytes()))
    this._responses.push(response)
    this._logger.debug(`C: ${describeRequest(request)}`)
  }

  async flush(): Promise<void> {
    this._assertUsable()
    if (this._outbox.length === 0) {
      return
    }
    const data = Buffer.concat(this._outbox)
    this._outbox = []
    await this._write(data)
  }

  async fetch(): Promise<void> {
    this._assertUsable()
    const response = this._responses[0]
    if (!response) {
      throw new ProtocolError('Fetch called with no outstanding response')
    }
    const bytes = await this._nextMessage()
    try {
      const message = structureToResponseMessage(unpack(bytes))
      this._logger.debug(`S: ${message.type.toUpperCase()}`)
      response.receive(message)
    } catch (error) {
      throw this._abort(error)
    }
    if (response.complete) {
      this._responses.shift()
    }
  }

  async close(): Promise<void> {
    if (this._closed) {
      return
    }
    this._closed = true
    const socket = this._socket
    if (!socket.destroyed) {
      await new Promise<void>((resolve) => {
        socket.end(() => resolve())
      })
      socket.destroy()
    }
    this._logger.debug(`Connection to ${this.address} closed`)
  }

  private _assertUsable(): void {
    if (this._closed) {
      throw new ServiceUnavailableError(`Connection to ${this.address} is closed`)
    }
    if (this._failure) {
      throw this._failure
    }
  }

  private _write(data: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this._socket.write(data, (error) => {
        if (error) {
          reject(new ServiceUnavailableError(`Write to ${this.address} failed: ${error.message}`, error))
        } else {
          resolve()
        }
      })
    })
  }

  private _nextMessage(): Promise<Uint8Array> {
    const next = this._inbox.shift()
    if (next) {
      return Promise.resolve(next)
    }
    if (this._failure) {
      return Promise.reject(this._failure)
    }
    return new Promise<Uint8Array>((resolve, reject) => {
      this._waiter = { resolve, reject }
    })
  }

  private _onData(data: Uint8Array): void {
    try {
      let bytes = data
      if (this._handshakeBuffer) {
        const buffered = Buffer.concat([this._handshakeBuffer, bytes])
        if (buffered.length < 4) {
          this._handshakeBuffer = buffered
          return
        }
        this._handshakeBuffer = null
        const waiter = this._versionWaiter
        this._versionWaiter = null
        if (!waiter) {
          throw new ProtocolError('Received data before the handshake was sent')
        }
        waiter.resolve(buffered.subarray(0, 4))
        bytes = buffered.subarray(4)
      }
      for (const message of this._dechunker.feed(bytes)) {
        this._inbox.push(message)
      }
      this._wake()
    } catch (error) {
      this._abort(error)
    }
  }

  /**
   * Mark the connection defunct after a protocol violation and drop the socket
   */
  private _abort(error: unknown): Error {
    const failure = error instanceof Error ? error : new ProtocolError(String(error))
    this._logger.error(failure.message)
    this._fail(failure)
    this._socket.destroy()
    return failure
  }

  private _wake(): void {
    const waiter = this._waiter
    if (!waiter) {
      return
    }
    const next = this._inbox.shift()
    if (next) {
      this._waiter = null
      waiter.resolve(next)
    }
  }

  private _fail(error: Error): void {
    if (this._failure) {
      return
    }
    this._failure = error
    for (const waiter of [this._waiter, this._versionWaiter]) {
      waiter?.reject(error)
    }
    this._waiter = null
    this._versionWaiter = null
  }
}

/**
 * Open a TCP connection, perform the Bolt handshake and INIT
 */
export async function connect(address: ServerAddress, options: ConnectOptions): Promise<BoltConnection> {
  const logger = createLogger(options.logging)
  const label = `${address.host}:${address.port}`
  const host = address.host.startsWith('[') ? address.host.slice(1, -1) : address.host
  const socket = netConnect({ host, port: address.port })

  try {
    await once(socket, 'connect')
  } catch (error) {
    socket.destroy()
    const cause = error instanceof Error ? error : undefined
    throw new ServiceUnavailableError(`Unable to connect to ${label}: ${cause?.message ?? String(error)}`, cause)
  }

  const connection = new BoltConnection(socket, label, logger)
  try {
    await connection.handshake()
    await connection.init(options)
  } catch (error) {
    await connection.close()
    throw error
  }
  return connection
}
