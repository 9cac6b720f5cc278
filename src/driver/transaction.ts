/**
 * Transaction
 * A BEGIN ... COMMIT/ROLLBACK bracket around statements run through a session
 */

import { InvariantViolationError } from '../errors'
import type { Record } from '../result/record'
import type { Parameters } from '../types'
import type { Session } from './session'

export type TransactionState = 'open' | 'committed' | 'rolledBack'

/**
 * Transaction - created by Session.beginTransaction(). When closed it
 * commits if marked successful and rolls back otherwise.
 */
export class Transaction {
  readonly session: Session
  private _state: TransactionState = 'open'
  private _success = false

  private constructor(session: Session) {
    this.session = session
  }

  /**
   * Reserve the session's transaction slot and send BEGIN. The slot is
   * released again if BEGIN fails.
   */
  static async begin(session: Session): Promise<Transaction> {
    const transaction = new Transaction(session)
    const attached = session.attachTransaction(transaction)
    if (!attached.ok) {
      throw attached.error
    }

    try {
      await session.run('BEGIN')
    } catch (error) {
      session.detachTransaction(transaction)
      transaction._state = 'rolledBack'
      throw error
    }
    return transaction
  }

  /**
   * Whether close() will commit. Can be changed any number of times while
   * the transaction is open; only the final value takes effect.
   */
  get success(): boolean {
    return this._success
  }

  set success(value: boolean) {
    this._assertOpen('mark')
    this._success = value
  }

  get state(): TransactionState {
    return this._state
  }

  get closed(): boolean {
    return this._state !== 'open'
  }

  isOpen(): boolean {
    return this._state === 'open'
  }

  /**
   * Run a statement within this transaction
   */
  async run(statement: string | Uint8Array, parameters?: Parameters): Promise<Record[]> {
    this._assertOpen('run a statement in')
    return this.session.run(statement, parameters)
  }

  /**
   * Mark this transaction as successful and close it, sending COMMIT
   */
  async commit(): Promise<void> {
    this._assertOpen('commit')
    this._success = true
    await this.close()
  }

  /**
   * Mark this transaction as unsuccessful and close it, sending ROLLBACK
   */
  async rollback(): Promise<void> {
    this._assertOpen('roll back')
    this._success = false
    await this.close()
  }

  /**
   * Close this transaction, sending COMMIT if it is marked successful and
   * ROLLBACK otherwise. The transaction is closed and the session's slot
   * released even when the server rejects the statement.
   */
  async close(): Promise<void> {
    this._assertOpen('close')

    const statement = this._success ? 'COMMIT' : 'ROLLBACK'
    this._state = this._success ? 'committed' : 'rolledBack'

    let failure: unknown = null
    try {
      await this.session.run(statement)
    } catch (error) {
      failure = error
    }

    const detached = this.session.detachTransaction(this)
    if (failure !== null) {
      throw failure
    }
    if (!detached.ok) {
      throw detached.error
    }
  }

  private _assertOpen(operation: string): void {
    if (this._state !== 'open') {
      throw new InvariantViolationError(
        `Cannot ${operation} transaction: it is already ${this._state === 'committed' ? 'committed' : 'rolled back'}`
      )
    }
  }
}
