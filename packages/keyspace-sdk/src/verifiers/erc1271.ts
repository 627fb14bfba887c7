import {
  AbiDecodingDataSizeTooSmallError,
  AbiDecodingZeroDataError,
  BaseError,
  ContractFunctionRevertedError,
  ContractFunctionZeroDataError,
  ExecutionRevertedError,
  type Address,
  type Hex,
  type PublicClient,
} from 'viem';
import { erc1271Abi } from '../abi';
import { ERC1271_MAGIC_VALUE } from '../constants';
import type { KeyspaceLogger } from '../types';

export type Erc1271Verification = {
  signer: Address;
  hash: Hex;
  signature: Hex;
};

function hasRevertCode(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === ExecutionRevertedError.code;
}

// A revert, an empty return or an undecodable return is the owner contract saying no.
// Anything else (HTTP, timeout, unreachable node) is not an answer from the contract.
function isContractRefusal(error: unknown): boolean {
  if (!(error instanceof BaseError)) return false;
  const refusal = error.walk(
    (cause) =>
      cause instanceof ContractFunctionRevertedError ||
      cause instanceof ContractFunctionZeroDataError ||
      cause instanceof AbiDecodingZeroDataError ||
      cause instanceof AbiDecodingDataSizeTooSmallError ||
      cause instanceof ExecutionRevertedError ||
      hasRevertCode(cause),
  );
  return refusal !== null;
}

/**
 * Delegates to the signer contract's `isValidSignature`.
 *
 * A revert or any return value other than the magic value is a failed
 * verification. Transport failures are rethrown.
 */
export async function verifyErc1271Signature(
  client: PublicClient,
  { signer, hash, signature }: Erc1271Verification,
  logger: KeyspaceLogger = console,
): Promise<boolean> {
  try {
    const result = await client.readContract({
      address: signer,
      abi: erc1271Abi,
      functionName: 'isValidSignature',
      args: [hash, signature],
    });
    return result.toLowerCase() === ERC1271_MAGIC_VALUE;
  } catch (error) {
    if (!isContractRefusal(error)) throw error;
    logger.warn('[verifyErc1271Signature] isValidSignature reverted; treating as invalid', {
      signer,
      error: error instanceof BaseError ? error.shortMessage : String(error),
    });
    return false;
  }
}
