/**
 * Minimal ABIs for the contracts the account consults while authorizing a signature.
 *
 * - Key directory: publishes the current root.
 * - Proof verifier: confirms key material is bound to a keyspace key under a root.
 * - ERC-1271 signer: contract owners answer `isValidSignature`.
 * - Account: exposes the registered key type of each owner.
 */

export const keyDirectoryAbi = [
  {
    type: 'function',
    name: 'root',
    stateMutability: 'view',
    inputs: [],
    outputs: [{ name: '', type: 'bytes32' }],
  },
] as const;

export const stateProofVerifierAbi = [
  {
    type: 'function',
    name: 'verify',
    stateMutability: 'view',
    inputs: [
      { name: 'root', type: 'bytes32' },
      { name: 'keyspaceKey', type: 'uint256' },
      { name: 'keyMaterial', type: 'bytes' },
      { name: 'proof', type: 'bytes' },
    ],
    outputs: [{ name: '', type: 'bool' }],
  },
] as const;

export const erc1271Abi = [
  {
    type: 'function',
    name: 'isValidSignature',
    stateMutability: 'view',
    inputs: [
      { name: 'hash', type: 'bytes32' },
      { name: 'signature', type: 'bytes' },
    ],
    outputs: [{ name: 'magicValue', type: 'bytes4' }],
  },
] as const;

export const keyspaceAccountAbi = [
  {
    type: 'function',
    name: 'ownerKeyType',
    stateMutability: 'view',
    inputs: [{ name: 'keyspaceKey', type: 'uint256' }],
    outputs: [{ name: '', type: 'uint8' }],
  },
] as const;
