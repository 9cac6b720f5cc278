/**
 * Session
 * Logical session carried out over one exclusively owned connection
 */

import { Response } from '../connection/response'
import type { Connection } from '../connection/connection'
import type { FailureMessage, IgnoredMessage, Metadata } from '../connection/messages'
import { InvariantViolationError, ProtocolError, QueryFailureError } from '../errors'
import { createLogger } from '../logging'
import type { Logger } from '../logging'
import { Record } from '../result/record'
import { hydrate as defaultHydrate } from '../types/hydration'
import type { Hydrator, Parameters } from '../types'
import { BenchTest } from './bench-test'
import { Transaction } from './transaction'

type SessionState = 'open' | 'closed'

/**
 * What the session's transaction slot currently holds
 */
export type TransactionSlot =
  | { kind: 'idle' }
  | { kind: 'inTransaction'; transaction: Transaction }

/**
 * Outcome of a transaction slot transition
 */
export type TransitionResult =
  | { ok: true }
  | { ok: false; error: InvariantViolationError }

export interface SessionOptions {
  hydrate?: Hydrator
  logger?: Logger
  clock?: () => number
}

const textDecoder = new TextDecoder('utf-8')

function fieldsOf(metadata: Metadata): string[] {
  const fields = metadata.fields
  if (fields === undefined) {
    return []
  }
  if (!Array.isArray(fields) || !fields.every((field): field is string => typeof field === 'string')) {
    throw new ProtocolError('RUN metadata "fields" must be a list of strings')
  }
  return fields
}

/**
 * Session - runs statements over its connection and tracks at most one
 * open transaction. Sessions are normally obtained from Driver.session().
 */
export class Session {
  private _state: SessionState = 'open'
  private _slot: TransactionSlot = { kind: 'idle' }
  private readonly _connection: Connection
  private readonly _benchTests: BenchTest[] = []
  private readonly _hydrate: Hydrator
  private readonly _logger: Logger
  private readonly _clock?: () => number
  private _closing: Promise<void> | null = null

  constructor(connection: Connection, options: SessionOptions = {}) {
    this._connection = connection
    this._hydrate = options.hydrate ?? defaultHydrate
    this._logger = options.logger ?? createLogger()
    this._clock = options.clock
  }

  /**
   * Run a parameterised Cypher statement and collect every record it returns.
   *
   * RUN and PULL_ALL are queued together and flushed once; their responses
   * are consumed in that order. If the server fails either request, the
   * remaining responses are drained and the failure acknowledged before
   * the QueryFailureError is thrown, leaving the connection ready for the
   * next statement.
   */
  async run(statement: string | Uint8Array, parameters?: Parameters): Promise<Record[]> {
    this._assertOpen('run a statement')

    const text = typeof statement === 'string' ? statement : textDecoder.decode(statement)
    const params: Parameters = { ...(parameters ?? {}) }

    const bench = new BenchTest(this._clock)
    bench.mark('init')

    this._logger.debug(`Running ${JSON.stringify(text)}`)
    const runResponse = new Response(this._connection)
    const pullResponse = new Response(this._connection)
    this._connection.enqueue({ type: 'run', statement: text, parameters: params }, runResponse)
    this._connection.enqueue({ type: 'pullAll' }, pullResponse)

    bench.mark('startSend')
    await this._connection.flush()
    bench.mark('endSend')

    let keys: string[] = []
    for await (const message of runResponse.messages()) {
      switch (message.type) {
        case 'success':
          keys = fieldsOf(message.metadata)
          bench.mark('startRecv')
          break
        case 'record':
          throw new ProtocolError('RUN response must not carry records')
        default:
          throw await this._recover(text, message, [pullResponse])
      }
    }

    const lookup = Record.buildLookup(keys)
    const records: Record[] = []
    for await (const message of pullResponse.messages()) {
      switch (message.type) {
        case 'record':
          if (message.fields.length !== keys.length) {
            throw new ProtocolError(
              `Record has ${message.fields.length} values but the result has ${keys.length} fields`
            )
          }
          records.push(new Record(keys, message.fields.map((value) => this._hydrate(value)), lookup))
          break
        case 'success':
          bench.mark('endRecv')
          break
        default:
          throw await this._recover(text, message, [])
      }
    }

    bench.mark('done')
    this._benchTests.push(bench)
    return records
  }

  /**
   * Drain the responses still queued behind a failed one and acknowledge
   * the failure so the server accepts further requests
   */
  private async _recover(
    statement: string,
    failure: FailureMessage | IgnoredMessage,
    remaining: Response[]
  ): Promise<QueryFailureError> {
    for (const response of remaining) {
      await response.consume()
    }

    if (failure.type === 'failure') {
      const ack = new Response(this._connection)
      this._connection.enqueue({ type: 'ackFailure' }, ack)
      await this._connection.flush()
      const outcome = await ack.consume()
      if (outcome.type !== 'success') {
        this._logger.error(`ACK_FAILURE was answered with ${outcome.type.toUpperCase()}`)
      }
    }

    const error = new QueryFailureError(statement, failure.metadata)
    this._logger.warn(`Statement ${JSON.stringify(statement)} failed: [${error.code}] ${error.message}`)
    return error
  }

  /**
   * Begin an explicit transaction. Fails if one is already open.
   */
  async beginTransaction(): Promise<Transaction> {
    this._assertOpen('begin a transaction')
    return Transaction.begin(this)
  }

  /**
   * Alias of beginTransaction()
   */
  newTransaction(): Promise<Transaction> {
    return this.beginTransaction()
  }

  /**
   * Occupy the transaction slot. Only Transaction calls this.
   */
  attachTransaction(transaction: Transaction): TransitionResult {
    if (this._state !== 'open') {
      return { ok: false, error: new InvariantViolationError('Cannot begin a transaction on a closed session') }
    }
    if (this._slot.kind === 'inTransaction') {
      return {
        ok: false,
        error: new InvariantViolationError('A transaction is already open. Close it before starting a new one.'),
      }
    }
    if (transaction.session !== this) {
      return { ok: false, error: new InvariantViolationError('Transaction belongs to a different session') }
    }
    this._slot = { kind: 'inTransaction', transaction }
    return { ok: true }
  }

  /**
   * Release the transaction slot held by `transaction`. Only Transaction calls this.
   */
  detachTransaction(transaction: Transaction): TransitionResult {
    if (this._slot.kind !== 'inTransaction' || this._slot.transaction !== transaction) {
      return { ok: false, error: new InvariantViolationError('Transaction is not the current transaction of this session') }
    }
    this._slot = { kind: 'idle' }
    return { ok: true }
  }

  /**
   * Close the session and its connection. An open transaction is rolled back first.
   */
  close(): Promise<void> {
    if (!this._closing) {
      this._closing = this._close()
    }
    return this._closing
  }

  private async _close(): Promise<void> {
    if (this._slot.kind === 'inTransaction') {
      const transaction = this._slot.transaction
      try {
        await transaction.rollback()
      } catch (error) {
        this._logger.warn(
          `Rolling back open transaction on close failed: ${error instanceof Error ? error.message : String(error)}`
        )
      }
    }

    this._state = 'closed'
    await this._connection.close()
    this._logger.debug('Session closed')
  }

  private _assertOpen(operation: string): void {
    if (this._state !== 'open') {
      throw new InvariantViolationError(`Cannot ${operation} on a closed session`)
    }
  }

  get transaction(): Transaction | null {
    return this._slot.kind === 'inTransaction' ? this._slot.transaction : null
  }

  /**
   * Latency samples, one per successful run(), oldest first
   */
  get benchTests(): readonly BenchTest[] {
    return this._benchTests
  }

  get closed(): boolean {
    return this._state === 'closed'
  }
}
