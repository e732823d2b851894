import type { Abi, Address, Hash, Hex } from 'viem'

import type { ChainClientError } from './errors'
import type { Result } from './result'

export type DeploymentStage =
  | 'Init'
  | 'IdentityReady'
  | 'ArtifactReady'
  | 'NonceReady'
  | 'GasEstimated'
  | 'PriceReady'
  | 'Built'
  | 'Signed'
  | 'Submitted'
  | 'Confirmed'
  | 'Failed'

export type DeploymentFailureKind =
  | 'ConfigurationError'
  | 'ArtifactNotFound'
  | 'ArtifactMalformed'
  | 'InvalidKey'
  | 'NodeUnreachable'
  | 'Timeout'
  | 'RpcError'
  | 'GasEstimationFailure'
  | 'TransactionBuildError'
  | 'SigningError'
  | 'SubmissionTimeout'
  | 'OnChainRevert'

export interface IContractArtifact {
  abi: Abi
  bytecode: Hex
}

export interface IDeploymentInput {
  name: string
  symbol: string
}

export interface IDeploymentRequest {
  readonly name: string
  readonly symbol: string
  readonly feeRecipient: Address
  readonly migrationThreshold: bigint
}

// name, symbol, migrationThreshold, feeRecipient
export type ConstructorArgs = readonly [string, string, bigint, Address]

export interface IUnsignedTransaction {
  from: Address
  nonce: number
  gasLimit: bigint
  gasPrice: bigint
  chainId: number
  data: Hex
}

export interface ISignedTransaction {
  serializedTransaction: Hex
  hash: Hash
}

export interface IDeploymentReceipt {
  transactionHash: Hash
  status: 'success' | 'reverted'
  contractAddress: Address | null
  blockNumber: bigint
  gasUsed: bigint
}

export interface ITransactionDetails {
  hash: Hash
  from: Address
  nonce: number
  gas: bigint
  gasPrice?: bigint
  blockNumber: bigint | null
}

export interface IDeploymentSuccess {
  success: true
  contractAddress: Address
  transactionHash: Hash
}

export interface IDeploymentFailure {
  success: false
  stage: DeploymentStage
  kind: DeploymentFailureKind
  reason: string
  transactionHash?: Hash
}

export type DeploymentResult = IDeploymentSuccess | IDeploymentFailure

export type DeploymentResponse = { contractAddress: Address } | { error: string }

export interface IChainClient {
  isConnected(): Promise<boolean>
  getChainId(): Promise<number>
  getNonce(address: Address): Promise<number>
  getGasPrice(): Promise<bigint>
  estimateGas(call: { from: Address; data: Hex }): Promise<bigint>
  submit(transaction: ISignedTransaction): Promise<Hash>
  waitForReceipt(
    hash: Hash,
    timeoutMs: number
  ): Promise<Result<ChainClientError, IDeploymentReceipt>>
  getTransaction(hash: Hash): Promise<ITransactionDetails>
}

export interface IOrchestratorOptions {
  gasLimitBuffer: bigint
  fallbackGasPrice: bigint
  receiptTimeoutMs: number
}

export interface IRpcClientConfig {
  rpcUrl: string
  retryCount: number
  retryDelayMs: number
  timeoutMs: number
  pollingIntervalMs: number
}

export interface IDeployerConfig {
  rpc: IRpcClientConfig
  privateKey?: string
  artifactPath?: string
  feeRecipient: Address
  migrationThreshold: bigint
  orchestrator: IOrchestratorOptions
}
