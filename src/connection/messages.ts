/**
 * Bolt v1 request and response messages
 */

import { ProtocolError } from '../errors'
import { isStructure, Structure } from '../packstream/structure'
import type { AuthToken, Parameters } from '../types'

export const INIT = 0x01
export const ACK_FAILURE = 0x0e
export const RESET = 0x0f
export const RUN = 0x10
export const DISCARD_ALL = 0x2f
export const PULL_ALL = 0x3f

export const SUCCESS = 0x70
export const RECORD = 0x71
export const IGNORED = 0x7e
export const FAILURE = 0x7f

export type Metadata = Record<string, unknown>

/**
 * Requests a session can queue on a connection
 */
export type Request =
  | { type: 'init'; clientName: string; authToken: AuthToken }
  | { type: 'run'; statement: string; parameters: Parameters }
  | { type: 'pullAll' }
  | { type: 'discardAll' }
  | { type: 'ackFailure' }
  | { type: 'reset' }

export type RecordMessage = { type: 'record'; fields: unknown[] }
export type SuccessMessage = { type: 'success'; metadata: Metadata }
export type FailureMessage = { type: 'failure'; metadata: Metadata }
export type IgnoredMessage = { type: 'ignored'; metadata: Metadata }

export type TerminalMessage = SuccessMessage | FailureMessage | IgnoredMessage

/**
 * Everything the server can send back for one request: zero or more
 * records followed by exactly one terminal message
 */
export type ResponseMessage = RecordMessage | TerminalMessage

export function isTerminal(message: ResponseMessage): message is TerminalMessage {
  return message.type !== 'record'
}

export function describeRequest(request: Request): string {
  switch (request.type) {
    case 'init':
      return `INIT ${JSON.stringify(request.clientName)}`
    case 'run':
      return `RUN ${JSON.stringify(request.statement)}`
    case 'pullAll':
      return 'PULL_ALL'
    case 'discardAll':
      return 'DISCARD_ALL'
    case 'ackFailure':
      return 'ACK_FAILURE'
    case 'reset':
      return 'RESET'
  }
}

/**
 * Encode a request as the structure sent on the wire
 */
export function requestToStructure(request: Request): Structure {
  switch (request.type) {
    case 'init':
      return new Structure(INIT, [request.clientName, { ...request.authToken }])
    case 'run':
      return new Structure(RUN, [request.statement, request.parameters])
    case 'pullAll':
      return new Structure(PULL_ALL, [])
    case 'discardAll':
      return new Structure(DISCARD_ALL, [])
    case 'ackFailure':
      return new Structure(ACK_FAILURE, [])
    case 'reset':
      return new Structure(RESET, [])
  }
}

function metadataOf(structure: Structure, name: string): Metadata {
  const [metadata] = structure.fields
  if (metadata === undefined) {
    return {}
  }
  if (typeof metadata !== 'object' || metadata === null || Array.isArray(metadata) || isStructure(metadata)) {
    throw new ProtocolError(`${name} metadata must be a map`)
  }
  return Object.fromEntries(Object.entries(metadata))
}

/**
 * Decode a structure received from the server into a response message
 */
export function structureToResponseMessage(value: unknown): ResponseMessage {
  if (!isStructure(value)) {
    throw new ProtocolError(`Expected a message structure, got ${typeof value}`)
  }
  switch (value.signature) {
    case SUCCESS:
      return { type: 'success', metadata: metadataOf(value, 'SUCCESS') }
    case FAILURE:
      return { type: 'failure', metadata: metadataOf(value, 'FAILURE') }
    case IGNORED:
      return { type: 'ignored', metadata: metadataOf(value, 'IGNORED') }
    case RECORD: {
      const [fields] = value.fields
      if (!Array.isArray(fields)) {
        throw new ProtocolError('RECORD fields must be a list')
      }
      return { type: 'record', fields }
    }
    default:
      throw new ProtocolError(
        `Unexpected response message signature 0x${value.signature.toString(16).toUpperCase()}`
      )
  }
}
