#!/usr/bin/env tsx

import { defineCommand, runMain } from 'citty'
import { consola } from 'consola'
import { config } from 'dotenv'

import { createViemChainClient } from './chainClient'
import { loadDeployerConfig } from './config'
import { LOG_TAG } from './constants'
import { DeploymentOrchestrator } from './orchestrator'
import {
  createDeploymentRequest,
  parseDeploymentInput,
  toDeploymentResponse,
} from './request'
import { isLeft } from './result'

config()

// RPC URLs often embed provider API keys
const describeEndpoint = (rpcUrl: string): string => new URL(rpcUrl).host

const main = defineCommand({
  meta: {
    name: 'deploy-token',
    version: '0.1.0',
    description: 'Deploy a launch token contract and report its address',
  },
  args: {
    name: {
      type: 'string',
      required: true,
      description: 'Token name',
    },
    symbol: {
      type: 'string',
      required: true,
      description: 'Token symbol',
    },
    artifact: {
      type: 'string',
      description: 'Compiled contract JSON, overrides CONTRACT_ARTIFACT_PATH',
    },
    rpcUrl: {
      type: 'string',
      description: 'Node endpoint, overrides RPC_URL',
    },
    json: {
      type: 'boolean',
      default: false,
      description: 'Print the response as JSON',
    },
  },
  run: async ({ args }) => {
    const deployerConfig = loadDeployerConfig({
      ...process.env,
      ...(args.rpcUrl ? { RPC_URL: args.rpcUrl } : {}),
      ...(args.artifact ? { CONTRACT_ARTIFACT_PATH: args.artifact } : {}),
    })

    const input = parseDeploymentInput({ name: args.name, symbol: args.symbol })
    if (isLeft(input)) throw new Error(input.error)

    const logger = consola.withTag(LOG_TAG)
    const chainClient = createViemChainClient(deployerConfig.rpc, logger)
    const endpoint = describeEndpoint(deployerConfig.rpc.rpcUrl)

    if (await chainClient.isConnected())
      logger.info(`Connected to network at ${endpoint}`)
    else logger.warn(`Could not connect to network at ${endpoint}`)

    const orchestrator = new DeploymentOrchestrator({
      chainClient,
      privateKey: deployerConfig.privateKey,
      artifactPath: deployerConfig.artifactPath,
      options: deployerConfig.orchestrator,
      logger,
    })

    const result = await orchestrator.deploy(
      createDeploymentRequest(input.data, deployerConfig)
    )
    const response = toDeploymentResponse(result)

    if (args.json) console.log(JSON.stringify(response))
    else if ('contractAddress' in response)
      consola.success(`Token deployed at ${response.contractAddress}`)
    else consola.error(`Deployment failed: ${response.error}`)

    if (!result.success) process.exitCode = 1
  },
})

runMain(main)
