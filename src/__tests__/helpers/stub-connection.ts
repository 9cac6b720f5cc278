/**
 * In-process stand-in for a Bolt server connection.
 *
 * Replies are computed when requests are flushed and handed out one
 * message per fetch(), in request order. Like a real server, every request
 * after a FAILURE is IGNORED until ACK_FAILURE arrives.
 */

import type { Connection } from '../../connection/connection'
import type { Request, ResponseMessage } from '../../connection/messages'
import type { Response } from '../../connection/response'
import { ProtocolError, ServiceUnavailableError } from '../../errors'

export type Script = (request: Request) => ResponseMessage[]

export interface StubResult {
  fields: string[]
  rows: unknown[][]
}

export interface StubFailure {
  failure: { code: string; message: string }
  /** Which request fails: RUN (default) or PULL_ALL after `rows` */
  on?: 'run' | 'pull'
  fields?: string[]
  rows?: unknown[][]
}

export type StubOutcome = StubResult | StubFailure

const EMPTY: StubResult = { fields: [], rows: [] }

function isFailure(outcome: StubOutcome): outcome is StubFailure {
  return 'failure' in outcome
}

/**
 * Build a script answering RUN by statement text. BEGIN, COMMIT and
 * ROLLBACK succeed with no fields unless listed; any other unlisted
 * statement fails with a syntax error.
 */
export function statementScript(outcomes: { [statement: string]: StubOutcome }): Script {
  let current: StubOutcome = EMPTY

  return (request) => {
    switch (request.type) {
      case 'run': {
        const listed = outcomes[request.statement]
        if (listed) {
          current = listed
        } else if (['BEGIN', 'COMMIT', 'ROLLBACK'].includes(request.statement)) {
          current = EMPTY
        } else {
          current = {
            failure: { code: 'Neo.ClientError.Statement.SyntaxError', message: `Invalid input '${request.statement}'` },
          }
        }
        if (isFailure(current) && (current.on ?? 'run') === 'run') {
          return [{ type: 'failure', metadata: { ...current.failure } }]
        }
        return [{ type: 'success', metadata: { fields: [...(current.fields ?? [])] } }]
      }
      case 'pullAll': {
        const rows = current.rows ?? []
        const records: ResponseMessage[] = rows.map((fields) => ({ type: 'record', fields: [...fields] }))
        if (isFailure(current)) {
          return [...records, { type: 'failure', metadata: { ...current.failure } }]
        }
        return [...records, { type: 'success', metadata: { type: 'r' } }]
      }
      default:
        return [{ type: 'success', metadata: {} }]
    }
  }
}

interface InFlight {
  request: Request
  response: Response
  replies: ResponseMessage[]
}

export class StubConnection implements Connection {
  readonly sent: Request[] = []
  flushes = 0
  closeCount = 0
  private readonly _script: Script
  private _queued: { request: Request; response: Response }[] = []
  private readonly _inFlight: InFlight[] = []
  private _failed = false
  private _closed = false

  constructor(script: Script) {
    this._script = script
  }

  get closed(): boolean {
    return this._closed
  }

  /**
   * Requests queued or sent whose responses are not yet complete
   */
  get pending(): number {
    return this._queued.length + this._inFlight.length
  }

  enqueue(request: Request, response: Response): void {
    if (this._closed) {
      throw new ServiceUnavailableError('Stub connection is closed')
    }
    this._queued.push({ request, response })
  }

  async flush(): Promise<void> {
    this.flushes++
    for (const { request, response } of this._queued) {
      this.sent.push(request)
      this._inFlight.push({ request, response, replies: this._reply(request) })
    }
    this._queued = []
  }

  async fetch(): Promise<void> {
    const head = this._inFlight[0]
    if (!head) {
      throw new ProtocolError('Fetch called with no outstanding response')
    }
    const message = head.replies.shift()
    if (!message) {
      throw new ServiceUnavailableError(`Stub has no more replies for ${head.request.type}`)
    }
    head.response.receive(message)
    if (head.response.complete) {
      this._inFlight.shift()
    }
  }

  async close(): Promise<void> {
    this.closeCount++
    this._closed = true
  }

  /**
   * Statements sent with RUN, in order
   */
  statements(): string[] {
    const statements: string[] = []
    for (const request of this.sent) {
      if (request.type === 'run') {
        statements.push(request.statement)
      }
    }
    return statements
  }

  private _reply(request: Request): ResponseMessage[] {
    if (request.type === 'ackFailure') {
      this._failed = false
      return [{ type: 'success', metadata: {} }]
    }
    if (this._failed) {
      return [{ type: 'ignored', metadata: {} }]
    }
    const replies = this._script(request)
    if (replies.some((message) => message.type === 'failure')) {
      this._failed = true
    }
    return replies
  }
}
