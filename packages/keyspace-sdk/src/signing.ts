import type { Address, Hex, LocalAccount } from 'viem';
import { replaySafeTypedData } from './eip712';
import { KeyType } from './keyTypes';
import { encodeOwnerPayload, encodeSignatureWrapper } from './signatureWrapper';
import type { DomainContext, WebAuthnAuth, WebAuthnPublicKey } from './types';
import { base64UrlChallenge } from './verifiers/webauthn';

/**
 * Wraps a secp256k1 (EOA or ERC-1271) owner signature for `isValidSignature`.
 */
export function wrapSecp256k1Signature(params: {
  keyspaceKey: bigint;
  signer: Address;
  signature: Hex;
  stateProof: Hex;
}): Hex {
  const payload = encodeOwnerPayload({
    keyType: KeyType.Secp256k1,
    keyMaterial: { signer: params.signer },
    signature: params.signature,
    stateProof: params.stateProof,
  });
  return encodeSignatureWrapper({ keyspaceKey: params.keyspaceKey, payload });
}

/**
 * Wraps a passkey assertion for `isValidSignature`.
 */
export function wrapWebAuthnSignature(params: {
  keyspaceKey: bigint;
  publicKey: WebAuthnPublicKey;
  auth: WebAuthnAuth;
  stateProof: Hex;
}): Hex {
  const payload = encodeOwnerPayload({
    keyType: KeyType.WebAuthn,
    keyMaterial: params.publicKey,
    signature: params.auth,
    stateProof: params.stateProof,
  });
  return encodeSignatureWrapper({ keyspaceKey: params.keyspaceKey, payload });
}

/**
 * Signs the account's replay-safe hash of `hash` with a local EOA, through EIP-712
 * typed data, and wraps the result.
 */
export async function signReplaySafe(params: {
  account: LocalAccount;
  domain: DomainContext;
  hash: Hex;
  keyspaceKey: bigint;
  stateProof: Hex;
}): Promise<Hex> {
  const signature = await params.account.signTypedData(replaySafeTypedData(params.domain, params.hash));
  return wrapSecp256k1Signature({
    keyspaceKey: params.keyspaceKey,
    signer: params.account.address,
    signature,
    stateProof: params.stateProof,
  });
}

/**
 * The challenge string a passkey must sign for a replay-safe hash.
 */
export function webAuthnChallengeFor(replaySafeHash: Hex): string {
  return base64UrlChallenge(replaySafeHash);
}
