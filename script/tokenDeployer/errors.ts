import { BaseError } from 'viem'

export type ArtifactErrorCode = 'NotFound' | 'Malformed'

export type ChainClientErrorCode = 'NodeUnreachable' | 'Timeout' | 'RpcError'

export class ConfigurationError extends Error {
  public readonly code = 'ConfigurationError'

  public constructor(message: string, public readonly fields: string[] = []) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export class ArtifactError extends Error {
  public constructor(
    public readonly code: ArtifactErrorCode,
    message: string,
    public readonly path: string
  ) {
    super(message)
    this.name = 'ArtifactError'
  }
}

/**
 * Raised when key material cannot be turned into a signer. The message never
 * echoes the material itself.
 */
export class KeyError extends Error {
  public readonly code = 'InvalidKey'

  public constructor(message: string) {
    super(message)
    this.name = 'KeyError'
  }
}

export class SigningError extends Error {
  public readonly code = 'SigningError'

  public constructor(message: string) {
    super(message)
    this.name = 'SigningError'
  }
}

export class TransactionBuildError extends Error {
  public readonly code = 'TransactionBuildError'

  public constructor(message: string) {
    super(message)
    this.name = 'TransactionBuildError'
  }
}

export class ChainClientError extends Error {
  public constructor(
    public readonly code: ChainClientErrorCode,
    message: string
  ) {
    super(message)
    this.name = 'ChainClientError'
  }
}

/**
 * One-line description of a thrown value. viem errors carry a multi-line
 * message with docs links and version details; their short message is used.
 */
export const describeError = (error: unknown): string => {
  if (error instanceof BaseError) return error.shortMessage
  return error instanceof Error ? error.message : String(error)
}
