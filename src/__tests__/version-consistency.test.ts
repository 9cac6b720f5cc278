import { describe, it, expect } from 'vitest'
import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { VERSION } from '../version'
import { DEFAULT_USER_AGENT } from '../driver/driver'

describe('version consistency', () => {
  it('VERSION matches package.json', () => {
    const packageJsonPath = fileURLToPath(new URL('../../package.json', import.meta.url))
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'))

    expect(packageJson).toMatchObject({ version: VERSION })
  })

  it('default user agent carries the version', () => {
    expect(DEFAULT_USER_AGENT).toBe(`graphwire/${VERSION}`)
  })
})
