import { parseGwei } from 'viem'

// Added on top of the node's gas estimate to absorb estimation error
export const DEFAULT_GAS_LIMIT_BUFFER = 100_000n

// Used when the node cannot report a gas price. Not bounded against network
// conditions: under congestion a deployment priced this way can stay pending.
export const DEFAULT_FALLBACK_GAS_PRICE = parseGwei('1')

// Timeouts and polling
export const RECEIPT_TIMEOUT_MS = 300_000 // 5 minutes
export const RECEIPT_POLLING_INTERVAL_MS = 4_000 // 4 seconds
export const RPC_TIMEOUT_MS = 15_000 // 15 seconds
export const RPC_RETRY_COUNT = 3
export const RPC_RETRY_DELAY_MS = 500

// Market cap (in ETH) at which a launched token migrates its liquidity
export const DEFAULT_MIGRATION_THRESHOLD_ETH = '0.01'

export const LOG_TAG = 'token-deployer'
