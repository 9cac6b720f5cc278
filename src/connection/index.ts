/**
 * Connection Module Exports
 */

export type { Connection } from './connection'
export { Response } from './response'
export { BoltConnection, connect, handshakeBytes, BOLT_MAGIC_PREAMBLE } from './bolt-connection'
export { chunk, Dechunker, MAX_CHUNK_SIZE } from './chunking'
export { isTerminal, requestToStructure, structureToResponseMessage } from './messages'
export type {
  Request,
  ResponseMessage,
  RecordMessage,
  SuccessMessage,
  FailureMessage,
  IgnoredMessage,
  TerminalMessage,
  Metadata,
} from './messages'
