/**
 * Keyspace account configuration
 *
 * Every variable can be set per chain (`KEYSPACE_RPC_URL_BASE_SEPOLIA`) with the
 * unsuffixed name (`KEYSPACE_RPC_URL`) as fallback.
 */

import { getAddress, isAddress, type Address, type Chain } from 'viem';
import { base, baseSepolia, mainnet, sepolia } from 'viem/chains';
import { KeyspaceConfigError } from './errors';

export const CHAIN_CONFIG = {
  1: { suffix: 'MAINNET', chain: mainnet },
  11155111: { suffix: 'SEPOLIA', chain: sepolia },
  8453: { suffix: 'BASE', chain: base },
  84532: { suffix: 'BASE_SEPOLIA', chain: baseSepolia },
} as const;

export type SupportedChainId = keyof typeof CHAIN_CONFIG;

/**
 * Default chain ID used when KEYSPACE_CHAIN_ID is not set
 */
export const DEFAULT_CHAIN_ID: SupportedChainId = 84532; // Base Sepolia

export type Env = Record<string, string | undefined>;

export type KeyspaceConfig = {
  chainId: number;
  chain?: Chain;
  rpcUrl: string;
  accountAddress: Address;
  directoryAddress: Address;
  verifierAddress: Address;
  requireUserVerification: boolean;
};

function isSupportedChainId(chainId: number): chainId is SupportedChainId {
  return Object.prototype.hasOwnProperty.call(CHAIN_CONFIG, chainId);
}

export function getChainById(chainId: number): Chain | undefined {
  return isSupportedChainId(chainId) ? CHAIN_CONFIG[chainId].chain : undefined;
}

/**
 * Chain-specific environment variable, falling back to the base name.
 */
export function getChainEnvVarDetails(
  env: Env,
  baseName: string,
  chainId: number,
): { value: string; chainKey: string; usedKey: string } {
  const chainKey = isSupportedChainId(chainId)
    ? `${baseName}_${CHAIN_CONFIG[chainId].suffix}`
    : `${baseName}_${chainId}`;
  const chainValue = env[chainKey]?.trim();
  const fallbackValue = env[baseName]?.trim();
  const value = chainValue || fallbackValue || '';
  const usedKey = chainValue ? chainKey : fallbackValue ? baseName : chainKey;
  return { value, chainKey, usedKey };
}

function parseChainId(raw: string | undefined): number {
  if (!raw || !raw.trim()) return DEFAULT_CHAIN_ID;
  const chainId = Number(raw.trim());
  if (!Number.isSafeInteger(chainId) || chainId <= 0) {
    throw new KeyspaceConfigError(`KEYSPACE_CHAIN_ID must be a positive integer, got "${raw}"`);
  }
  return chainId;
}

function parseBoolean(raw: string): boolean {
  return ['1', 'true', 'yes'].includes(raw.trim().toLowerCase());
}

export function loadKeyspaceConfig(env: Env = process.env): KeyspaceConfig {
  const chainId = parseChainId(env.KEYSPACE_CHAIN_ID);
  const missing: string[] = [];
  const invalid: string[] = [];

  const required = (baseName: string): string => {
    const { value, chainKey } = getChainEnvVarDetails(env, baseName, chainId);
    if (!value) missing.push(chainKey);
    return value;
  };
  const address = (baseName: string): Address | undefined => {
    const value = required(baseName);
    if (!value) return undefined;
    if (!isAddress(value, { strict: false })) {
      invalid.push(`${baseName}=${value}`);
      return undefined;
    }
    return getAddress(value);
  };

  const rpcUrl = required('KEYSPACE_RPC_URL');
  const accountAddress = address('KEYSPACE_ACCOUNT_ADDRESS');
  const directoryAddress = address('KEYSPACE_DIRECTORY_ADDRESS');
  const verifierAddress = address('KEYSPACE_PROOF_VERIFIER_ADDRESS');
  const requireUserVerification = parseBoolean(
    getChainEnvVarDetails(env, 'KEYSPACE_REQUIRE_USER_VERIFICATION', chainId).value,
  );

  if (missing.length > 0) {
    throw new KeyspaceConfigError(`Missing required environment variables: ${missing.join(', ')}`, missing);
  }
  if (invalid.length > 0 || !accountAddress || !directoryAddress || !verifierAddress) {
    throw new KeyspaceConfigError(`Invalid addresses: ${invalid.join(', ')}`);
  }

  return {
    chainId,
    chain: getChainById(chainId),
    rpcUrl,
    accountAddress,
    directoryAddress,
    verifierAddress,
    requireUserVerification,
  };
}
