/**
 * URI Parsing for the Driver
 */

import { InvalidUriError, UnsupportedSchemeError } from '../errors'
import type { ParsedUri } from '../types'

export const SUPPORTED_SCHEMES = ['bolt'] as const
export const DEFAULT_PORT = 7687

function isSupportedScheme(scheme: string): boolean {
  return SUPPORTED_SCHEMES.some((supported) => supported === scheme)
}

/**
 * Parse a connection URI of the form bolt://host[:port]
 */
export function parseUri(uri: string): ParsedUri {
  if (!uri || typeof uri !== 'string') {
    throw new InvalidUriError('URI must be a non-empty string')
  }

  // Extract scheme
  const schemeMatch = uri.match(/^([a-z][a-z0-9+.-]*):\/\//i)
  if (!schemeMatch) {
    throw new InvalidUriError(`Unable to parse scheme from "${uri}"`)
  }

  const scheme = schemeMatch[1].toLowerCase()

  if (!isSupportedScheme(scheme)) {
    throw new UnsupportedSchemeError(scheme, SUPPORTED_SCHEMES)
  }

  const rest = uri.slice(schemeMatch[0].length)

  let host: string
  let portText: string | undefined
  let remaining: string

  // Handle IPv6 addresses
  if (rest.startsWith('[')) {
    const ipv6Match = rest.match(/^\[([^\]]+)\](?::(\d+))?(.*)$/)
    if (!ipv6Match) {
      throw new InvalidUriError(`Malformed IPv6 address in "${uri}"`)
    }
    host = `[${ipv6Match[1]}]`
    portText = ipv6Match[2]
    remaining = ipv6Match[3]
  } else {
    // Handle IPv4 or hostname
    const hostMatch = rest.match(/^([^:/?#]+)(?::(\d+))?(.*)$/)
    if (!hostMatch) {
      throw new InvalidUriError(`Unable to parse host from "${uri}"`)
    }
    host = hostMatch[1]
    portText = hostMatch[2]
    remaining = hostMatch[3]
  }

  if (remaining !== '' && remaining !== '/') {
    throw new InvalidUriError(`Unexpected "${remaining}" after host and port in "${uri}"`)
  }

  const port = portText === undefined ? DEFAULT_PORT : parseInt(portText, 10)
  if (port < 1 || port > 65535) {
    throw new InvalidUriError(`Port must be between 1 and 65535, got ${port}`)
  }

  return {
    scheme,
    host,
    port,
  }
}
