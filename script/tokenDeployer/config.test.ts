import { getAddress, parseEther, parseGwei } from 'viem'
import { describe, expect, it } from 'vitest'

import { loadDeployerConfig } from './config'
import { ConfigurationError } from './errors'

const FEE_RECIPIENT = '0x00000000000000000000000000000000000fee01'

const baseEnv = {
  RPC_URL: 'http://127.0.0.1:8545',
  FEE_RECIPIENT_ADDRESS: FEE_RECIPIENT,
}

const configurationErrorFor = (env: NodeJS.ProcessEnv): ConfigurationError => {
  try {
    loadDeployerConfig(env)
  } catch (error) {
    if (error instanceof ConfigurationError) return error
    throw error
  }
  throw new Error('expected the configuration to be rejected')
}

describe('loadDeployerConfig', () => {
  it('applies defaults for every optional setting', () => {
    expect(loadDeployerConfig(baseEnv)).toEqual({
      rpc: {
        rpcUrl: 'http://127.0.0.1:8545',
        retryCount: 3,
        retryDelayMs: 500,
        timeoutMs: 15_000,
        pollingIntervalMs: 4_000,
      },
      privateKey: undefined,
      artifactPath: undefined,
      feeRecipient: getAddress(FEE_RECIPIENT),
      migrationThreshold: parseEther('0.01'),
      orchestrator: {
        gasLimitBuffer: 100_000n,
        fallbackGasPrice: parseGwei('1'),
        receiptTimeoutMs: 300_000,
      },
    })
  })

  it('reads and trims every override', () => {
    const config = loadDeployerConfig({
      ...baseEnv,
      PRIVATE_KEY: ' test-secret ',
      CONTRACT_ARTIFACT_PATH: ' artifacts/LaunchToken.json ',
      MIGRATION_THRESHOLD_ETH: '2.5',
      RECEIPT_TIMEOUT_MS: '60000',
      GAS_LIMIT_BUFFER: '50000',
      FALLBACK_GAS_PRICE_GWEI: '0.5',
      RPC_TIMEOUT_MS: '1000',
      RPC_RETRY_COUNT: '0',
      RPC_RETRY_DELAY_MS: '0',
      RECEIPT_POLLING_INTERVAL_MS: '100',
    })

    expect(config.privateKey).toBe('test-secret')
    expect(config.artifactPath).toBe('artifacts/LaunchToken.json')
    expect(config.migrationThreshold).toBe(2_500_000_000_000_000_000n)
    expect(config.orchestrator).toEqual({
      gasLimitBuffer: 50_000n,
      fallbackGasPrice: 500_000_000n,
      receiptTimeoutMs: 60_000,
    })
    expect(config.rpc).toEqual({
      rpcUrl: 'http://127.0.0.1:8545',
      retryCount: 0,
      retryDelayMs: 0,
      timeoutMs: 1_000,
      pollingIntervalMs: 100,
    })
  })

  it('treats a blank key or artifact path as not configured', () => {
    const config = loadDeployerConfig({
      ...baseEnv,
      PRIVATE_KEY: '   ',
      CONTRACT_ARTIFACT_PATH: '',
    })

    expect(config.privateKey).toBeUndefined()
    expect(config.artifactPath).toBeUndefined()
  })

  it('requires a fee recipient', () => {
    const error = configurationErrorFor({ RPC_URL: baseEnv.RPC_URL })

    expect(error.fields).toEqual(['FEE_RECIPIENT_ADDRESS'])
    expect(error.message).toBe(
      'Invalid deployer configuration: FEE_RECIPIENT_ADDRESS: Fee recipient address not set'
    )
  })

  it('rejects a fee recipient that is not an address', () => {
    const error = configurationErrorFor({
      ...baseEnv,
      FEE_RECIPIENT_ADDRESS: 'treasury',
    })

    expect(error.fields).toEqual(['FEE_RECIPIENT_ADDRESS'])
    expect(error.message).toContain('must be a valid EVM address')
  })

  it('names every invalid variable at once', () => {
    const error = configurationErrorFor({
      FEE_RECIPIENT_ADDRESS: FEE_RECIPIENT,
      RECEIPT_TIMEOUT_MS: 'soon',
      GAS_LIMIT_BUFFER: '-5',
    })

    expect(error.fields).toEqual([
      'RPC_URL',
      'RECEIPT_TIMEOUT_MS',
      'GAS_LIMIT_BUFFER',
    ])
    expect(error.message).toContain('RPC_URL: RPC URL not set')
  })

  it.each(['0', '1.5', ''])(
    'rejects a receipt timeout of "%s"',
    (RECEIPT_TIMEOUT_MS) => {
      expect(
        configurationErrorFor({ ...baseEnv, RECEIPT_TIMEOUT_MS }).fields
      ).toEqual(['RECEIPT_TIMEOUT_MS'])
    }
  )

  it('rejects a negative migration threshold', () => {
    expect(
      configurationErrorFor({ ...baseEnv, MIGRATION_THRESHOLD_ETH: '-1' })
        .fields
    ).toEqual(['MIGRATION_THRESHOLD_ETH'])
  })
})
