import type { Address, Hex } from 'viem';
import type { KeyType, RegisteredKeyType } from './keyTypes';

export type OwnerRecord = {
  keyspaceKey: bigint; // uint256
  keyType: RegisteredKeyType;
};

export type SignatureWrapper = {
  keyspaceKey: bigint; // uint256
  payload: Hex; // bytes, layout depends on the registered key type
};

export type WebAuthnPublicKey = {
  x: bigint; // uint256
  y: bigint; // uint256
};

export type WebAuthnAuth = {
  authenticatorData: Hex; // bytes
  clientDataJSON: string;
  challengeIndex: bigint; // byte offset of `"challenge":` in clientDataJSON
  typeIndex: bigint; // byte offset of `"type":` in clientDataJSON
  r: bigint;
  s: bigint;
};

export type Secp256k1Payload = {
  keyType: typeof KeyType.Secp256k1;
  keyMaterial: { signer: Address };
  signature: Hex; // bytes
  stateProof: Hex; // bytes
};

export type WebAuthnPayload = {
  keyType: typeof KeyType.WebAuthn;
  keyMaterial: WebAuthnPublicKey;
  signature: WebAuthnAuth;
  stateProof: Hex; // bytes
};

export type OwnerPayload = Secp256k1Payload | WebAuthnPayload;

/**
 * ERC-5267 view of the account's EIP-712 domain.
 */
export type Eip712DomainRecord = {
  fields: Hex; // bytes1
  name: string;
  version: string;
  chainId: bigint;
  verifyingContract: Address;
  salt: Hex; // bytes32
  extensions: readonly bigint[];
};

export type DomainContext = {
  chainId: number | bigint;
  verifyingContract: Address;
};

export type ProofConfirmation = {
  root: Hex; // bytes32
  keyspaceKey: bigint;
  keyMaterial: Hex; // abi-encoded key material
  proof: Hex;
};

export type KeyspaceLogger = Pick<Console, 'debug' | 'warn'>;
