import { p256 } from '@noble/curves/p256';
import { bytesToHex, concatBytes, hexToBytes, numberToBytes, sha256, stringToBytes, type Hex } from 'viem';
import type { WebAuthnAuth, WebAuthnPublicKey } from '../types';

const P256_N = 0xffffffff00000000ffffffffffffffffbce6faada7179e84f3b9cac2fc632551n;
const P256_N_DIV_2 = P256_N / 2n;

const AUTH_DATA_FLAGS_UP = 0x01;
const AUTH_DATA_FLAGS_UV = 0x04;
// rpIdHash (32) + flags (1) + signCount (4)
const MIN_AUTHENTICATOR_DATA_BYTES = 37;

const EXPECTED_TYPE = stringToBytes('"type":"webauthn.get"');

export type WebAuthnVerification = {
  publicKey: WebAuthnPublicKey;
  challenge: Hex;
  auth: WebAuthnAuth;
  requireUserVerification?: boolean;
};

export function base64UrlChallenge(challenge: Hex): string {
  return Buffer.from(hexToBytes(challenge)).toString('base64url');
}

function bytesAt(haystack: Uint8Array, index: bigint, needle: Uint8Array): boolean {
  if (index < 0n || index + BigInt(needle.length) > BigInt(haystack.length)) return false;
  const start = Number(index);
  for (let i = 0; i < needle.length; i++) {
    if (haystack[start + i] !== needle[i]) return false;
  }
  return true;
}

function assertionDigest(authenticatorData: Uint8Array, clientData: Uint8Array): Uint8Array {
  return sha256(concatBytes([authenticatorData, sha256(clientData, 'bytes')]), 'bytes');
}

/**
 * Verifies a WebAuthn assertion whose challenge is `challenge`.
 *
 * Checks, in order: the `"type":"webauthn.get"` marker at `typeIndex`, the
 * base64url challenge at `challengeIndex`, the user-present flag (and
 * user-verified flag when required), a low `s`, then the P-256 signature over
 * `sha256(authenticatorData || sha256(clientDataJSON))`.
 */
export function verifyWebAuthnSignature({
  publicKey,
  challenge,
  auth,
  requireUserVerification = false,
}: WebAuthnVerification): boolean {
  const clientData = stringToBytes(auth.clientDataJSON);
  if (!bytesAt(clientData, auth.typeIndex, EXPECTED_TYPE)) return false;

  const expectedChallenge = stringToBytes(`"challenge":"${base64UrlChallenge(challenge)}"`);
  if (!bytesAt(clientData, auth.challengeIndex, expectedChallenge)) return false;

  let authenticatorData: Uint8Array;
  try {
    authenticatorData = hexToBytes(auth.authenticatorData);
  } catch {
    return false;
  }
  if (authenticatorData.length < MIN_AUTHENTICATOR_DATA_BYTES) return false;

  const flags = authenticatorData[32] ?? 0;
  if ((flags & AUTH_DATA_FLAGS_UP) !== AUTH_DATA_FLAGS_UP) return false;
  if (requireUserVerification && (flags & AUTH_DATA_FLAGS_UV) !== AUTH_DATA_FLAGS_UV) return false;

  // malleability: only the low-s form is accepted
  if (auth.s > P256_N_DIV_2) return false;

  const messageHash = assertionDigest(authenticatorData, clientData);

  try {
    const point = concatBytes([
      new Uint8Array([0x04]),
      numberToBytes(publicKey.x, { size: 32 }),
      numberToBytes(publicKey.y, { size: 32 }),
    ]);
    return p256.verify({ r: auth.r, s: auth.s }, messageHash, point, { lowS: true });
  } catch {
    // point not on the curve, or r/s out of range
    return false;
  }
}

/**
 * The digest an authenticator signs for an assertion.
 */
export function webAuthnMessageHash(authenticatorData: Hex, clientDataJSON: string): Hex {
  return bytesToHex(assertionDigest(hexToBytes(authenticatorData), stringToBytes(clientDataJSON)));
}
