/**
 * Token deployment pipeline: takes a token name and symbol, deploys the
 * launch token contract and reports its address or a stage-tagged failure.
 *
 * @packageDocumentation
 */

export { artifactExists, loadArtifact } from './artifact'
export {
  ViemChainClient,
  classifyChainError,
  createViemChainClient,
} from './chainClient'
export { loadDeployerConfig } from './config'
export {
  ArtifactError,
  ChainClientError,
  ConfigurationError,
  KeyError,
  SigningError,
  TransactionBuildError,
} from './errors'
export { SigningIdentity, deriveSigningIdentity } from './identity'
export {
  DEFAULT_ORCHESTRATOR_OPTIONS,
  DeploymentOrchestrator,
} from './orchestrator'
export {
  createDeploymentRequest,
  parseDeploymentInput,
  toDeploymentResponse,
} from './request'
export {
  applyGasBuffer,
  buildConstructorArgs,
  buildDeploymentTransaction,
  encodeDeploymentData,
} from './transaction'

export type {
  ConstructorArgs,
  DeploymentFailureKind,
  DeploymentResponse,
  DeploymentResult,
  DeploymentStage,
  IChainClient,
  IContractArtifact,
  IDeployerConfig,
  IDeploymentFailure,
  IDeploymentInput,
  IDeploymentReceipt,
  IDeploymentRequest,
  IDeploymentSuccess,
  IOrchestratorOptions,
  IRpcClientConfig,
  ISignedTransaction,
  ITransactionDetails,
  IUnsignedTransaction,
} from './types'
