/**
 * Authentication Tokens
 * Sent to the server in the INIT message when a connection is opened
 */

import type { AuthToken } from '../types'

/**
 * Creates a basic authentication token
 */
function basic(username: string, password: string, realm?: string): AuthToken {
  const token: AuthToken = {
    scheme: 'basic',
    principal: username,
    credentials: password,
  }
  if (realm !== undefined) {
    token.realm = realm
  }
  return token
}

/**
 * Creates a token for servers with authentication disabled
 */
function none(): AuthToken {
  return { scheme: 'none' }
}

/**
 * Creates a custom authentication token
 */
function custom(
  principal: string,
  credentials: string,
  realm: string,
  scheme: string,
  parameters?: Record<string, unknown>
): AuthToken {
  const token: AuthToken = {
    scheme,
    principal,
    credentials,
    realm,
  }
  if (parameters !== undefined) {
    token.parameters = parameters
  }
  return token
}

export const auth = {
  basic,
  none,
  custom,
}

export type { AuthToken }
