/**
 * PackStream Module Exports
 */

export { Packer, pack } from './packer'
export { Unpacker, unpack } from './unpacker'
export { Structure, isStructure } from './structure'
