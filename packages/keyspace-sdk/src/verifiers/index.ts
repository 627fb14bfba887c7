import type { Address, Hex, PublicClient } from 'viem';
import { KeyType } from '../keyTypes';
import type { KeyspaceLogger, OwnerPayload } from '../types';
import { verifyEoaSignature } from './eoa';
import { verifyErc1271Signature } from './erc1271';
import { verifyWebAuthnSignature } from './webauthn';

export { verifyEoaSignature, type EoaVerification } from './eoa';
export { verifyErc1271Signature, type Erc1271Verification } from './erc1271';
export { verifyWebAuthnSignature, webAuthnMessageHash, base64UrlChallenge, type WebAuthnVerification } from './webauthn';

export type OwnerSignatureCheck = {
  payload: OwnerPayload;
  hash: Hex;
  requireUserVerification?: boolean;
};

async function hasCode(client: PublicClient, address: Address): Promise<boolean> {
  const code = await client.getCode({ address });
  return code !== undefined && code !== '0x';
}

/**
 * Local cryptographic check of an owner signature against `hash`.
 *
 * This is the only place that branches on key type. A secp256k1 owner is first
 * checked by ECDSA recovery; only when that fails and the signer has code (a
 * contract wallet, or an EOA with a delegation designator) is ERC-1271 asked.
 */
export async function verifyOwnerSignature(
  client: PublicClient,
  { payload, hash, requireUserVerification }: OwnerSignatureCheck,
  logger: KeyspaceLogger = console,
): Promise<boolean> {
  switch (payload.keyType) {
    case KeyType.Secp256k1: {
      const { signer } = payload.keyMaterial;
      if (await verifyEoaSignature({ signer, hash, signature: payload.signature })) return true;
      if (!(await hasCode(client, signer))) return false;
      return verifyErc1271Signature(client, { signer, hash, signature: payload.signature }, logger);
    }
    case KeyType.WebAuthn:
      return verifyWebAuthnSignature({
        publicKey: payload.keyMaterial,
        challenge: hash,
        auth: payload.signature,
        requireUserVerification,
      });
  }
}
