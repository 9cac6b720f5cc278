/**
 * Response - the client side of one outstanding request
 */

import { ProtocolError } from '../errors'
import { isTerminal } from './messages'
import type { ResponseMessage, TerminalMessage } from './messages'
import type { Connection } from './connection'

/**
 * Buffers the messages the connection delivers for one request and lets a
 * caller consume them in arrival order, driving the connection whenever the
 * buffer runs dry. Complete once a success, failure or ignored message has
 * arrived.
 */
export class Response {
  private readonly _connection: Connection
  private readonly _buffer: ResponseMessage[] = []
  private _outcome: TerminalMessage | null = null
  private _received = 0

  constructor(connection: Connection) {
    this._connection = connection
  }

  get complete(): boolean {
    return this._outcome !== null
  }

  /**
   * The terminal message, once it has arrived
   */
  get outcome(): TerminalMessage | null {
    return this._outcome
  }

  /**
   * Number of messages delivered so far, terminal message included
   */
  get received(): number {
    return this._received
  }

  /**
   * Called by the connection for every message addressed to this response
   */
  receive(message: ResponseMessage): void {
    if (this._outcome) {
      throw new ProtocolError(
        `Received ${message.type} message after the response completed with ${this._outcome.type}`
      )
    }
    this._received++
    this._buffer.push(message)
    if (isTerminal(message)) {
      this._outcome = message
    }
  }

  /**
   * Yield messages in arrival order until the terminal one has been yielded
   */
  async *messages(): AsyncGenerator<ResponseMessage, void, undefined> {
    for (;;) {
      const next = this._buffer.shift()
      if (next) {
        yield next
        if (isTerminal(next)) {
          return
        }
        continue
      }
      if (this._outcome) {
        return
      }
      await this._connection.fetch()
    }
  }

  /**
   * Drive the connection until this response is complete, discarding
   * any records, and return the terminal message
   */
  async consume(): Promise<TerminalMessage> {
    for await (const message of this.messages()) {
      if (isTerminal(message)) {
        return message
      }
    }
    if (this._outcome) {
      return this._outcome
    }
    throw new ProtocolError('Response ended without a terminal message')
  }
}
