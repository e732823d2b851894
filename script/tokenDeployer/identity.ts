import { isAddress, isAddressEqual, keccak256, type Address } from 'viem'
import { privateKeyToAccount, type PrivateKeyAccount } from 'viem/accounts'

import { KeyError, SigningError, describeError } from './errors'
import { left, right, type Result } from './result'
import type { ISignedTransaction, IUnsignedTransaction } from './types'

const PRIVATE_KEY_PATTERN = /^[0-9a-fA-F]{64}$/

/**
 * Signing capability derived from a deployer key.
 *
 * Only viem's account is kept: it signs through a closure and exposes no key
 * field, so neither logging nor serialising an identity can reveal the key.
 */
export class SigningIdentity {
  public readonly address: Address

  private constructor(private readonly account: PrivateKeyAccount) {
    this.address = account.address
  }

  public static derive(material: string): Result<KeyError, SigningIdentity> {
    const rawKey = material.trim().replace(/^0x/i, '')
    if (!PRIVATE_KEY_PATTERN.test(rawKey))
      return left(
        new KeyError(
          'Invalid private key format. Expected a 64-character hexadecimal string (with or without "0x" prefix).'
        )
      )

    try {
      return right(new SigningIdentity(privateKeyToAccount(`0x${rawKey}`)))
    } catch {
      // secp256k1 rejects zero and scalars beyond the curve order
      return left(new KeyError('Private key is not a valid secp256k1 key.'))
    }
  }

  /**
   * Signs a legacy contract-creation transaction with EIP-155 replay
   * protection. Signatures are deterministic (RFC 6979).
   */
  public async sign(
    transaction: IUnsignedTransaction
  ): Promise<ISignedTransaction> {
    if (
      !isAddress(transaction.from) ||
      !isAddressEqual(transaction.from, this.address)
    )
      throw new SigningError(
        `Transaction sender ${transaction.from} does not match signing identity ${this.address}`
      )
    if (!Number.isSafeInteger(transaction.nonce) || transaction.nonce < 0)
      throw new SigningError(`Invalid nonce: ${transaction.nonce}`)
    if (transaction.gasLimit <= 0n)
      throw new SigningError(`Invalid gas limit: ${transaction.gasLimit}`)
    if (transaction.gasPrice < 0n)
      throw new SigningError(`Invalid gas price: ${transaction.gasPrice}`)

    try {
      const serializedTransaction = await this.account.signTransaction({
        type: 'legacy',
        chainId: transaction.chainId,
        nonce: transaction.nonce,
        gas: transaction.gasLimit,
        gasPrice: transaction.gasPrice,
        data: transaction.data,
      })

      return {
        serializedTransaction,
        hash: keccak256(serializedTransaction),
      }
    } catch (error) {
      throw new SigningError(
        `Failed to sign deployment transaction: ${describeError(error)}`
      )
    }
  }

  public toJSON(): { address: Address } {
    return { address: this.address }
  }

  public toString(): string {
    return `SigningIdentity(${this.address})`
  }
}

export const deriveSigningIdentity = (
  material: string
): Result<KeyError, SigningIdentity> => SigningIdentity.derive(material)
