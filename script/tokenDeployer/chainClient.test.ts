import { createConsola, LogLevels } from 'consola'
import {
  BaseError,
  HttpRequestError,
  TimeoutError,
  WaitForTransactionReceiptTimeoutError,
  createPublicClient,
  http,
  type Address,
  type Hash,
} from 'viem'
import { beforeEach, describe, expect, it, vi } from 'vitest'

import { classifyChainError, createViemChainClient } from './chainClient'
import { ChainClientError } from './errors'
import { isLeft, isRight } from './result'
import type { IRpcClientConfig } from './types'

const mocks = vi.hoisted(() => ({
  client: {
    getChainId: vi.fn(),
    getTransactionCount: vi.fn(),
    getGasPrice: vi.fn(),
    estimateGas: vi.fn(),
    sendRawTransaction: vi.fn(),
    waitForTransactionReceipt: vi.fn(),
    getTransaction: vi.fn(),
  },
}))

vi.mock('viem', async (importOriginal) => {
  const actual = await importOriginal<typeof import('viem')>()
  return {
    ...actual,
    createPublicClient: vi.fn(() => mocks.client),
    http: vi.fn(() => ({})),
  }
})

const RPC_URL = 'http://127.0.0.1:8545'
const DEPLOYER: Address = '0x0000000000000000000000000000000000000003'
const CONTRACT_ADDRESS: Address = '0x0000000000000000000000000000000000000002'
const TX_HASH: Hash = `0x${'ab'.repeat(32)}`

const config: IRpcClientConfig = {
  rpcUrl: RPC_URL,
  retryCount: 2,
  retryDelayMs: 100,
  timeoutMs: 5_000,
  pollingIntervalMs: 250,
}

const silentLogger = createConsola({ level: LogLevels.silent })

describe('classifyChainError', () => {
  it('passes an already classified error through', () => {
    const error = new ChainClientError('Timeout', 'slow node')

    expect(classifyChainError(error)).toBe(error)
  })

  it('classifies a viem request timeout', () => {
    const error = new TimeoutError({ body: { method: 'eth_chainId' }, url: RPC_URL })

    expect(classifyChainError(error).code).toBe('Timeout')
  })

  it('classifies an HTTP failure without a status as unreachable', () => {
    const error = new HttpRequestError({
      url: RPC_URL,
      cause: new Error('fetch failed'),
    })

    expect(classifyChainError(error).code).toBe('NodeUnreachable')
  })

  it('classifies an HTTP failure with a status as a node error', () => {
    const error = new HttpRequestError({ url: RPC_URL, status: 503 })

    expect(classifyChainError(error).code).toBe('RpcError')
  })

  it('finds a transport error along the cause chain', () => {
    const error = new BaseError('Request failed.', {
      cause: new HttpRequestError({ url: RPC_URL }),
    })

    const classified = classifyChainError(error)

    expect(classified.code).toBe('NodeUnreachable')
    expect(classified.message).toBe('Request failed.')
  })

  it.each([
    ['connect ECONNREFUSED 127.0.0.1:8545', 'NodeUnreachable'],
    ['getaddrinfo ENOTFOUND node.invalid', 'NodeUnreachable'],
    ['socket hang up', 'NodeUnreachable'],
    ['request timed out after 5000ms', 'Timeout'],
    ['connect ETIMEDOUT 10.0.0.1:8545', 'Timeout'],
    ['nonce too low', 'RpcError'],
  ])('classifies "%s" as %s', (message, code) => {
    const classified = classifyChainError(new Error(message))

    expect(classified.code).toBe(code)
    expect(classified.message).toBe(message)
  })

  it('classifies a thrown non-error value as a node error', () => {
    const classified = classifyChainError('boom')

    expect(classified).toBeInstanceOf(ChainClientError)
    expect(classified.code).toBe('RpcError')
    expect(classified.message).toBe('boom')
  })
})

describe('ViemChainClient', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('builds an HTTP transport with the configured retry and timeout', () => {
    createViemChainClient(config, silentLogger)

    expect(http).toHaveBeenCalledWith(RPC_URL, {
      retryCount: 2,
      retryDelay: 100,
      timeout: 5_000,
    })
    expect(createPublicClient).toHaveBeenCalledTimes(1)
  })

  describe('isConnected', () => {
    it('is true when the node answers', async () => {
      mocks.client.getChainId.mockResolvedValue(31337)

      const client = createViemChainClient(config, silentLogger)

      expect(await client.isConnected()).toBe(true)
    })

    it('is false when the node cannot be reached', async () => {
      mocks.client.getChainId.mockRejectedValue(
        new Error('connect ECONNREFUSED 127.0.0.1:8545')
      )

      const client = createViemChainClient(config, silentLogger)

      expect(await client.isConnected()).toBe(false)
    })
  })

  it('reads the nonce for the deployer', async () => {
    mocks.client.getTransactionCount.mockResolvedValue(9)

    const nonce = await createViemChainClient(config, silentLogger).getNonce(
      DEPLOYER
    )

    expect(nonce).toBe(9)
    expect(mocks.client.getTransactionCount).toHaveBeenCalledWith({
      address: DEPLOYER,
    })
  })

  it('estimates gas for a contract creation from the deployer', async () => {
    mocks.client.estimateGas.mockResolvedValue(21_000n)

    const estimate = await createViemChainClient(
      config,
      silentLogger
    ).estimateGas({ from: DEPLOYER, data: '0x6080604052' })

    expect(estimate).toBe(21_000n)
    expect(mocks.client.estimateGas).toHaveBeenCalledWith({
      account: DEPLOYER,
      data: '0x6080604052',
    })
  })

  it('submits the raw signed transaction', async () => {
    mocks.client.sendRawTransaction.mockResolvedValue(TX_HASH)

    const hash = await createViemChainClient(config, silentLogger).submit({
      serializedTransaction: '0xf86c',
      hash: TX_HASH,
    })

    expect(hash).toBe(TX_HASH)
    expect(mocks.client.sendRawTransaction).toHaveBeenCalledWith({
      serializedTransaction: '0xf86c',
    })
  })

  it('rejects with a classified error when a call fails', async () => {
    mocks.client.getGasPrice.mockRejectedValue(new Error('fetch failed'))

    const request = createViemChainClient(config, silentLogger).getGasPrice()

    await expect(request).rejects.toBeInstanceOf(ChainClientError)
    await expect(request).rejects.toMatchObject({
      code: 'NodeUnreachable',
      message: 'fetch failed',
    })
  })

  describe('waitForReceipt', () => {
    it('maps a mined receipt', async () => {
      mocks.client.waitForTransactionReceipt.mockResolvedValue({
        transactionHash: TX_HASH,
        status: 'success',
        contractAddress: CONTRACT_ADDRESS,
        blockNumber: 12n,
        gasUsed: 80_000n,
        logs: [],
      })

      const result = await createViemChainClient(
        config,
        silentLogger
      ).waitForReceipt(TX_HASH, 60_000)

      if (!isRight(result)) throw result.error
      expect(result.data).toEqual({
        transactionHash: TX_HASH,
        status: 'success',
        contractAddress: CONTRACT_ADDRESS,
        blockNumber: 12n,
        gasUsed: 80_000n,
      })
      expect(mocks.client.waitForTransactionReceipt).toHaveBeenCalledWith({
        hash: TX_HASH,
        timeout: 60_000,
        pollingInterval: 250,
      })
    })

    it('reports a missing contract address as null', async () => {
      mocks.client.waitForTransactionReceipt.mockResolvedValue({
        transactionHash: TX_HASH,
        status: 'reverted',
        contractAddress: undefined,
        blockNumber: 12n,
        gasUsed: 80_000n,
      })

      const result = await createViemChainClient(
        config,
        silentLogger
      ).waitForReceipt(TX_HASH, 60_000)

      if (!isRight(result)) throw result.error
      expect(result.data.status).toBe('reverted')
      expect(result.data.contractAddress).toBeNull()
    })

    it('returns a timeout instead of throwing when the wait expires', async () => {
      mocks.client.waitForTransactionReceipt.mockRejectedValue(
        new WaitForTransactionReceiptTimeoutError({ hash: TX_HASH })
      )

      const result = await createViemChainClient(
        config,
        silentLogger
      ).waitForReceipt(TX_HASH, 60_000)

      if (!isLeft(result)) throw new Error('expected a timeout')
      expect(result.error.code).toBe('Timeout')
      expect(result.error.message).toBe(
        `Transaction ${TX_HASH} was not mined within 60000ms`
      )
    })

    it('throws a classified error for other failures', async () => {
      mocks.client.waitForTransactionReceipt.mockRejectedValue(
        new HttpRequestError({ url: RPC_URL, status: 500 })
      )

      await expect(
        createViemChainClient(config, silentLogger).waitForReceipt(
          TX_HASH,
          60_000
        )
      ).rejects.toMatchObject({ code: 'RpcError' })
    })
  })

  it('maps transaction details for troubleshooting', async () => {
    mocks.client.getTransaction.mockResolvedValue({
      hash: TX_HASH,
      from: DEPLOYER,
      nonce: 5,
      gas: 121_000n,
      gasPrice: 1_000_000_000n,
      blockNumber: 12n,
      input: '0x6080604052',
    })

    const details = await createViemChainClient(
      config,
      silentLogger
    ).getTransaction(TX_HASH)

    expect(details).toEqual({
      hash: TX_HASH,
      from: DEPLOYER,
      nonce: 5,
      gas: 121_000n,
      gasPrice: 1_000_000_000n,
      blockNumber: 12n,
    })
    expect(mocks.client.getTransaction).toHaveBeenCalledWith({ hash: TX_HASH })
  })
})
