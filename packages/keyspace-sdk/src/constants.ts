import { keccak256, toHex } from 'viem';

/**
 * ERC-1271 return codes
 *
 * `isValidSignature` answers with exactly one of these two values.
 */
export const ERC1271_MAGIC_VALUE = '0x1626ba7e' as const;
export const ERC1271_INVALID_VALUE = '0xffffffff' as const;

export type Erc1271Result = typeof ERC1271_MAGIC_VALUE | typeof ERC1271_INVALID_VALUE;

/**
 * EIP-712 domain of the account
 *
 * Only name, version, chainId and verifyingContract are present, which is what
 * the ERC-5267 fields bitmap 0x0f encodes.
 */
export const DOMAIN_NAME = 'Coinbase Smart Wallet' as const;
export const DOMAIN_VERSION = '1' as const;
export const EIP712_DOMAIN_FIELDS = '0x0f' as const;

export const EIP712_DOMAIN_TYPEHASH = keccak256(
  toHex('EIP712Domain(string name,string version,uint256 chainId,address verifyingContract)')
);
export const DOMAIN_NAME_HASH = keccak256(toHex(DOMAIN_NAME));
export const DOMAIN_VERSION_HASH = keccak256(toHex(DOMAIN_VERSION));

export const REPLAY_SAFE_PRIMARY_TYPE = 'CoinbaseSmartWalletMessage' as const;
export const REPLAY_SAFE_MESSAGE_TYPEHASH = keccak256(toHex('CoinbaseSmartWalletMessage(bytes32 hash)'));

/**
 * Signature wrapper payload version understood by this codec.
 */
export const PAYLOAD_VERSION_V1 = 1 as const;

/**
 * Smallest well-formed wrapper: keyspace key, payload offset, payload length.
 */
export const MIN_WRAPPER_BYTES = 96 as const;
