import { concatHex, encodeAbiParameters, getAddress, isHex, keccak256, size, zeroHash, type Hex } from 'viem';
import {
  DOMAIN_NAME,
  DOMAIN_NAME_HASH,
  DOMAIN_VERSION,
  DOMAIN_VERSION_HASH,
  EIP712_DOMAIN_FIELDS,
  EIP712_DOMAIN_TYPEHASH,
  REPLAY_SAFE_MESSAGE_TYPEHASH,
  REPLAY_SAFE_PRIMARY_TYPE,
} from './constants';
import { InvalidHashError } from './errors';
import type { DomainContext, Eip712DomainRecord } from './types';

function toChainId(chainId: number | bigint): bigint {
  return typeof chainId === 'bigint' ? chainId : BigInt(chainId);
}

export function assertHash(hash: Hex): void {
  if (!isHex(hash, { strict: true }) || size(hash) !== 32) {
    throw new InvalidHashError(String(hash));
  }
}

export function eip712Domain(ctx: DomainContext): Eip712DomainRecord {
  return {
    fields: EIP712_DOMAIN_FIELDS,
    name: DOMAIN_NAME,
    version: DOMAIN_VERSION,
    chainId: toChainId(ctx.chainId),
    verifyingContract: getAddress(ctx.verifyingContract),
    salt: zeroHash,
    extensions: [],
  };
}

export function domainSeparator(ctx: DomainContext): Hex {
  return keccak256(
    encodeAbiParameters(
      [{ type: 'bytes32' }, { type: 'bytes32' }, { type: 'bytes32' }, { type: 'uint256' }, { type: 'address' }],
      [EIP712_DOMAIN_TYPEHASH, DOMAIN_NAME_HASH, DOMAIN_VERSION_HASH, toChainId(ctx.chainId), getAddress(ctx.verifyingContract)]
    )
  );
}

// keccak256(abi.encode(keccak256("CoinbaseSmartWalletMessage(bytes32 hash)"), hash))
export function hashReplaySafeStruct(hash: Hex): Hex {
  assertHash(hash);
  return keccak256(
    encodeAbiParameters([{ type: 'bytes32' }, { type: 'bytes32' }], [REPLAY_SAFE_MESSAGE_TYPEHASH, hash])
  );
}

/**
 * Binds an application hash to this account and chain.
 *
 * Owners always sign this value, never the raw application hash, so a signature
 * for one account/chain cannot be replayed against another.
 */
export function replaySafeHash(ctx: DomainContext, hash: Hex): Hex {
  const structHash = hashReplaySafeStruct(hash);
  return keccak256(concatHex(['0x1901', domainSeparator(ctx), structHash]));
}

/**
 * Typed-data definition that hashes to `replaySafeHash(ctx, hash)`, for wallets
 * and libraries that sign through `eth_signTypedData_v4`.
 */
export function replaySafeTypedData(ctx: DomainContext, hash: Hex) {
  assertHash(hash);
  return {
    domain: {
      name: DOMAIN_NAME,
      version: DOMAIN_VERSION,
      chainId: toChainId(ctx.chainId),
      verifyingContract: getAddress(ctx.verifyingContract),
    },
    types: {
      [REPLAY_SAFE_PRIMARY_TYPE]: [{ name: 'hash', type: 'bytes32' }],
    },
    primaryType: REPLAY_SAFE_PRIMARY_TYPE,
    message: { hash },
  } as const;
}
