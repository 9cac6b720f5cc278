/**
 * Connection capability consumed by sessions
 */

import type { Request } from './messages'
import type { Response } from './response'

/**
 * A duplex channel to one server. Requests are queued together with the
 * response that will receive their outcome, written out on flush, and
 * answered strictly in submission order.
 */
export interface Connection {
  readonly closed: boolean

  /**
   * Queue a request; its reply messages go to `response`
   */
  enqueue(request: Request, response: Response): void

  /**
   * Write every queued request to the server
   */
  flush(): Promise<void>

  /**
   * Receive one message and deliver it to the oldest unresolved response
   */
  fetch(): Promise<void>

  close(): Promise<void>
}
