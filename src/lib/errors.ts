/**
 * Fatal errors of a generation run. Nothing catches these below the CLI.
 */

export class UnknownAttributionError extends Error {
  constructor(readonly value: string) {
    super(`Attribution not known: ${value}`)
    this.name = 'UnknownAttributionError'
  }
}

export class MalformedProviderError extends Error {
  constructor(readonly provider: string, readonly reason: string) {
    super(`Malformed provider "${provider}": ${reason}`)
    this.name = 'MalformedProviderError'
  }
}

export type FetchStep = 'clone' | 'browser' | 'parse' | 'read'

export class FetchError extends Error {
  constructor(readonly step: FetchStep, message: string, options?: { cause?: unknown }) {
    super(`[${step}] ${message}`, options)
    this.name = 'FetchError'
  }
}
