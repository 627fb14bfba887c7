import { decodeAbiParameters, encodeAbiParameters, getAddress, isHex, size, type Hex } from 'viem';
import { MIN_WRAPPER_BYTES, PAYLOAD_VERSION_V1 } from './constants';
import { MalformedWrapperError } from './errors';
import { KeyType, type RegisteredKeyType } from './keyTypes';
import type { OwnerPayload, Secp256k1Payload, SignatureWrapper, WebAuthnPayload } from './types';

// Wire format, version 1.
//
//   wrapper             = abi.encode(uint256 keyspaceKey, bytes payload)
//   secp256k1 payload   = abi.encode(uint8 version, address signer, bytes signature, bytes stateProof)
//   webauthn payload    = abi.encode(uint8 version, uint256 x, uint256 y, WebAuthnAuth auth, bytes stateProof)
//
// The payload carries no key-type tag; the registered type of the keyspace key picks the layout.

const WRAPPER_PARAMS = [
  { name: 'keyspaceKey', type: 'uint256' },
  { name: 'payload', type: 'bytes' },
] as const;

const SECP256K1_PAYLOAD_PARAMS = [
  { name: 'version', type: 'uint8' },
  { name: 'signer', type: 'address' },
  { name: 'signature', type: 'bytes' },
  { name: 'stateProof', type: 'bytes' },
] as const;

const WEBAUTHN_PAYLOAD_PARAMS = [
  { name: 'version', type: 'uint8' },
  { name: 'x', type: 'uint256' },
  { name: 'y', type: 'uint256' },
  {
    name: 'auth',
    type: 'tuple',
    components: [
      { name: 'authenticatorData', type: 'bytes' },
      { name: 'clientDataJSON', type: 'string' },
      { name: 'challengeIndex', type: 'uint256' },
      { name: 'typeIndex', type: 'uint256' },
      { name: 'r', type: 'uint256' },
      { name: 's', type: 'uint256' },
    ],
  },
  { name: 'stateProof', type: 'bytes' },
] as const;

const SECP256K1_KEY_MATERIAL_PARAMS = [{ name: 'signer', type: 'address' }] as const;

const WEBAUTHN_KEY_MATERIAL_PARAMS = [
  { name: 'x', type: 'uint256' },
  { name: 'y', type: 'uint256' },
] as const;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function assertVersion(version: number): void {
  if (version !== PAYLOAD_VERSION_V1) {
    throw new MalformedWrapperError(`Unsupported payload version ${version}`);
  }
}

export function encodeSignatureWrapper(wrapper: SignatureWrapper): Hex {
  return encodeAbiParameters(WRAPPER_PARAMS, [wrapper.keyspaceKey, wrapper.payload]);
}

export function decodeSignatureWrapper(signature: Hex): SignatureWrapper {
  if (!isHex(signature, { strict: true })) {
    throw new MalformedWrapperError('Signature is not hex encoded');
  }
  const length = size(signature);
  if (length < MIN_WRAPPER_BYTES) {
    throw new MalformedWrapperError(`Signature wrapper too short: ${length} bytes`);
  }
  try {
    const [keyspaceKey, payload] = decodeAbiParameters(WRAPPER_PARAMS, signature);
    return { keyspaceKey, payload };
  } catch (error) {
    throw new MalformedWrapperError(`Invalid signature wrapper layout: ${errorMessage(error)}`, error);
  }
}

function decodeSecp256k1Payload(payload: Hex): Secp256k1Payload {
  const [version, signer, signature, stateProof] = decodeAbiParameters(SECP256K1_PAYLOAD_PARAMS, payload);
  assertVersion(version);
  return {
    keyType: KeyType.Secp256k1,
    keyMaterial: { signer: getAddress(signer) },
    signature,
    stateProof,
  };
}

function decodeWebAuthnPayload(payload: Hex): WebAuthnPayload {
  const [version, x, y, auth, stateProof] = decodeAbiParameters(WEBAUTHN_PAYLOAD_PARAMS, payload);
  assertVersion(version);
  return {
    keyType: KeyType.WebAuthn,
    keyMaterial: { x, y },
    signature: {
      authenticatorData: auth.authenticatorData,
      clientDataJSON: auth.clientDataJSON,
      challengeIndex: auth.challengeIndex,
      typeIndex: auth.typeIndex,
      r: auth.r,
      s: auth.s,
    },
    stateProof,
  };
}

/**
 * Decodes the payload with the layout of the keyspace key's *registered* type.
 */
export function decodeOwnerPayload(keyType: RegisteredKeyType, payload: Hex): OwnerPayload {
  try {
    switch (keyType) {
      case KeyType.Secp256k1:
        return decodeSecp256k1Payload(payload);
      case KeyType.WebAuthn:
        return decodeWebAuthnPayload(payload);
    }
  } catch (error) {
    if (error instanceof MalformedWrapperError) throw error;
    throw new MalformedWrapperError(`Invalid payload layout: ${errorMessage(error)}`, error);
  }
}

export function encodeOwnerPayload(payload: OwnerPayload): Hex {
  switch (payload.keyType) {
    case KeyType.Secp256k1:
      return encodeAbiParameters(SECP256K1_PAYLOAD_PARAMS, [
        PAYLOAD_VERSION_V1,
        payload.keyMaterial.signer,
        payload.signature,
        payload.stateProof,
      ]);
    case KeyType.WebAuthn:
      return encodeAbiParameters(WEBAUTHN_PAYLOAD_PARAMS, [
        PAYLOAD_VERSION_V1,
        payload.keyMaterial.x,
        payload.keyMaterial.y,
        payload.signature,
        payload.stateProof,
      ]);
  }
}

/**
 * Canonical key-material bytes handed to the state-proof verifier.
 */
export function encodeKeyMaterial(payload: OwnerPayload): Hex {
  switch (payload.keyType) {
    case KeyType.Secp256k1:
      return encodeAbiParameters(SECP256K1_KEY_MATERIAL_PARAMS, [payload.keyMaterial.signer]);
    case KeyType.WebAuthn:
      return encodeAbiParameters(WEBAUTHN_KEY_MATERIAL_PARAMS, [payload.keyMaterial.x, payload.keyMaterial.y]);
  }
}
