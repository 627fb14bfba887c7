import { getAddress, type Address, type PublicClient } from 'viem';
import { keyspaceAccountAbi } from './abi';
import { KeyType, toKeyType } from './keyTypes';
import type { OwnerRegistry } from './ownerRegistry';

/**
 * Owner registry read straight from a deployed account.
 *
 * RPC failures are not caught: an unreachable registry is an infrastructure
 * fault, not an unregistered key.
 */
export class ContractOwnerRegistry implements OwnerRegistry {
  readonly address: Address;

  constructor(
    address: Address,
    private readonly client: PublicClient,
  ) {
    this.address = getAddress(address);
  }

  async typeOf(keyspaceKey: bigint): Promise<KeyType> {
    const raw = await this.client.readContract({
      address: this.address,
      abi: keyspaceAccountAbi,
      functionName: 'ownerKeyType',
      args: [keyspaceKey],
    });
    return toKeyType(raw);
  }

  async isRegistered(keyspaceKey: bigint): Promise<boolean> {
    return (await this.typeOf(keyspaceKey)) !== KeyType.None;
  }
}
