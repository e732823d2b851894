import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'

import { Abi as AbiSchema } from 'abitype/zod'
import type { Hex } from 'viem'
import { z } from 'zod'

import { ArtifactError } from './errors'
import { left, right, type Result } from './result'
import type { IContractArtifact } from './types'

const bytecodeSchema = z
  .string()
  .trim()
  .regex(
    /^(0x)?([0-9a-fA-F]{2})+$/,
    'bytecode must be a non-empty, even-length hex string'
  )

// Hardhat writes `bytecode` as a string, Foundry nests it under `bytecode.object`
const artifactSchema = z.object({
  abi: AbiSchema.refine((abi) => abi.length > 0, 'abi must not be empty'),
  bytecode: z.union([bytecodeSchema, z.object({ object: bytecodeSchema })]),
})

const toHex = (value: string): Hex => `0x${value.replace(/^0x/i, '')}`

const formatIssues = (issues: z.ZodIssue[]): string =>
  issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ')

/**
 * Cheap existence check run before the artifact is read and parsed
 */
export const artifactExists = (path: string): boolean => existsSync(path)

/**
 * Reads and validates a compiled contract artifact. The file is read on every
 * call so a reconfigured path or a recompiled contract is always picked up.
 */
export const loadArtifact = async (
  path: string
): Promise<Result<ArtifactError, IContractArtifact>> => {
  let contents: string
  try {
    contents = await readFile(path, 'utf8')
  } catch (error) {
    const code =
      error instanceof Error && 'code' in error
        ? String(error.code)
        : 'unknown error'
    return left(
      new ArtifactError(
        'NotFound',
        `Contract artifact file not found at ${path} (${code}). Ensure the contract is compiled and the path is correct.`,
        path
      )
    )
  }

  let document: unknown
  try {
    document = JSON.parse(contents)
  } catch {
    return left(
      new ArtifactError(
        'Malformed',
        `Could not decode JSON from ${path}. Ensure it is a valid JSON file.`,
        path
      )
    )
  }

  const parsed = artifactSchema.safeParse(document)
  if (!parsed.success)
    return left(
      new ArtifactError(
        'Malformed',
        `Contract artifact at ${path} is missing required fields: ${formatIssues(
          parsed.error.issues
        )}`,
        path
      )
    )

  const { abi, bytecode } = parsed.data
  return right({
    abi,
    bytecode: toHex(typeof bytecode === 'string' ? bytecode : bytecode.object),
  })
}
