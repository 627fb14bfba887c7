import { getAddress, type Address, type PublicClient } from 'viem';

/**
 * Where the account is executing: its own address and the live chain id.
 *
 * The chain id is read on every call; a forked chain must produce a different
 * domain separator.
 */
export interface ExecutionContext {
  readonly address: Address;
  getChainId(): Promise<number>;
}

export function publicClientContext(client: PublicClient, address: Address): ExecutionContext {
  const account = getAddress(address);
  return {
    address: account,
    getChainId: () => client.getChainId(),
  };
}

export function fixedChainContext(address: Address, chainId: number): ExecutionContext {
  const account = getAddress(address);
  return {
    address: account,
    getChainId: async () => chainId,
  };
}
