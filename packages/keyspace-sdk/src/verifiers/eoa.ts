import { hexToNumber, isAddressEqual, isHex, recoverAddress, size, slice, type Address, type Hex } from 'viem';

export type EoaVerification = {
  signer: Address;
  hash: Hex;
  signature: Hex;
};

/**
 * Plain secp256k1 check over the raw 32-byte digest (no EIP-191 prefix).
 *
 * Only 65-byte `r || s || v` signatures with v of 27 or 28 are considered; anything
 * else verifies as false.
 */
export async function verifyEoaSignature({ signer, hash, signature }: EoaVerification): Promise<boolean> {
  if (!isHex(signature, { strict: true }) || size(signature) !== 65) return false;
  const v = hexToNumber(slice(signature, 64, 65));
  if (v !== 27 && v !== 28) return false;
  try {
    const recovered = await recoverAddress({ hash, signature });
    return isAddressEqual(recovered, signer);
  } catch {
    // r or s outside the curve order
    return false;
  }
}
