import { consola, type ConsolaInstance } from 'consola'
import {
  BaseError,
  HttpRequestError,
  TimeoutError,
  WaitForTransactionReceiptTimeoutError,
  createPublicClient,
  http,
  type Address,
  type Hash,
  type Hex,
  type PublicClient,
} from 'viem'

import { LOG_TAG, RECEIPT_POLLING_INTERVAL_MS } from './constants'
import { ChainClientError, describeError } from './errors'
import { left, right, type Result } from './result'
import type {
  IChainClient,
  IDeploymentReceipt,
  IRpcClientConfig,
  ISignedTransaction,
  ITransactionDetails,
} from './types'

const timeoutMarkers = ['timeout', 'timed out', 'etimedout']

const unreachableMarkers = [
  'econnrefused',
  'econnreset',
  'enotfound',
  'ehostunreach',
  'fetch failed',
  'socket hang up',
  'network error',
]

const findCause = (
  error: unknown,
  predicate: (cause: unknown) => boolean
): unknown => {
  if (predicate(error)) return error
  if (error instanceof BaseError) return error.walk(predicate)
  return null
}

/**
 * Maps anything a node call throws onto the three chain failure classes.
 * viem's typed errors are checked along the cause chain first; the message
 * markers cover errors raised below viem (fetch, sockets).
 */
export const classifyChainError = (error: unknown): ChainClientError => {
  if (error instanceof ChainClientError) return error

  const message = describeError(error)

  if (findCause(error, (cause) => cause instanceof TimeoutError))
    return new ChainClientError('Timeout', message)

  const httpError = findCause(
    error,
    (cause) => cause instanceof HttpRequestError
  )
  // an HTTP status means the node answered, just not successfully
  if (httpError instanceof HttpRequestError)
    return new ChainClientError(
      httpError.status === undefined ? 'NodeUnreachable' : 'RpcError',
      message
    )

  const fullMessage = (
    error instanceof Error ? error.message : String(error)
  ).toLowerCase()

  if (timeoutMarkers.some((marker) => fullMessage.includes(marker)))
    return new ChainClientError('Timeout', message)

  if (unreachableMarkers.some((marker) => fullMessage.includes(marker)))
    return new ChainClientError('NodeUnreachable', message)

  return new ChainClientError('RpcError', message)
}

export class ViemChainClient implements IChainClient {
  public constructor(
    private readonly client: PublicClient,
    private readonly pollingIntervalMs = RECEIPT_POLLING_INTERVAL_MS,
    private readonly logger: ConsolaInstance = consola.withTag(LOG_TAG)
  ) {}

  public async isConnected(): Promise<boolean> {
    try {
      await this.client.getChainId()
      return true
    } catch (error) {
      this.logger.warn(
        `Node connectivity check failed: ${classifyChainError(error).message}`
      )
      return false
    }
  }

  public async getChainId(): Promise<number> {
    return this.call(() => this.client.getChainId())
  }

  public async getNonce(address: Address): Promise<number> {
    return this.call(() => this.client.getTransactionCount({ address }))
  }

  public async getGasPrice(): Promise<bigint> {
    return this.call(() => this.client.getGasPrice())
  }

  public async estimateGas(call: { from: Address; data: Hex }): Promise<bigint> {
    return this.call(() =>
      this.client.estimateGas({ account: call.from, data: call.data })
    )
  }

  public async submit(transaction: ISignedTransaction): Promise<Hash> {
    return this.call(() =>
      this.client.sendRawTransaction({
        serializedTransaction: transaction.serializedTransaction,
      })
    )
  }

  public async waitForReceipt(
    hash: Hash,
    timeoutMs: number
  ): Promise<Result<ChainClientError, IDeploymentReceipt>> {
    try {
      const receipt = await this.client.waitForTransactionReceipt({
        hash,
        timeout: timeoutMs,
        pollingInterval: this.pollingIntervalMs,
      })

      return right({
        transactionHash: receipt.transactionHash,
        status: receipt.status,
        contractAddress: receipt.contractAddress ?? null,
        blockNumber: receipt.blockNumber,
        gasUsed: receipt.gasUsed,
      })
    } catch (error) {
      if (error instanceof WaitForTransactionReceiptTimeoutError)
        return left(
          new ChainClientError(
            'Timeout',
            `Transaction ${hash} was not mined within ${timeoutMs}ms`
          )
        )

      throw classifyChainError(error)
    }
  }

  public async getTransaction(hash: Hash): Promise<ITransactionDetails> {
    const transaction = await this.call(() =>
      this.client.getTransaction({ hash })
    )

    return {
      hash: transaction.hash,
      from: transaction.from,
      nonce: transaction.nonce,
      gas: transaction.gas,
      gasPrice: transaction.gasPrice,
      blockNumber: transaction.blockNumber,
    }
  }

  private async call<T>(request: () => Promise<T>): Promise<T> {
    try {
      return await request()
    } catch (error) {
      throw classifyChainError(error)
    }
  }
}

/**
 * Builds a chain client over a single HTTP endpoint. Transport retries back
 * off exponentially from `retryDelayMs`; they retry a single request, never a
 * pipeline step.
 */
export const createViemChainClient = (
  config: IRpcClientConfig,
  logger?: ConsolaInstance
): ViemChainClient => {
  const transport = http(config.rpcUrl, {
    retryCount: config.retryCount,
    retryDelay: config.retryDelayMs,
    timeout: config.timeoutMs,
  })

  return new ViemChainClient(
    createPublicClient({ transport }),
    config.pollingIntervalMs,
    logger
  )
}
