import { OwnerRegistryError } from './errors';
import { KeyType, isRegisteredKeyType, keyTypeLabel, type RegisteredKeyType } from './keyTypes';
import type { OwnerRecord } from './types';

/**
 * Read-only view of the account's owners, as the authorization path sees it.
 *
 * `typeOf` returns `KeyType.None` for keyspace keys that are not owners.
 */
export interface OwnerRegistry {
  typeOf(keyspaceKey: bigint): Promise<KeyType>;
  isRegistered(keyspaceKey: bigint): Promise<boolean>;
}

export type OwnerInput = {
  keyspaceKey: bigint;
  keyType: KeyType;
};

/**
 * Owner set held in memory.
 *
 * This is the owner-management side: it can add and remove owners, and is handed to
 * `KeyspaceAccount` as a plain `OwnerRegistry`.
 */
export class InMemoryOwnerRegistry implements OwnerRegistry {
  private readonly records = new Map<bigint, RegisteredKeyType>();

  constructor(initialOwners: readonly OwnerInput[] = []) {
    for (const owner of initialOwners) {
      this.addOwner(owner);
    }
  }

  get ownerCount(): number {
    return this.records.size;
  }

  owners(): OwnerRecord[] {
    return Array.from(this.records, ([keyspaceKey, keyType]) => ({ keyspaceKey, keyType }));
  }

  addOwner(record: OwnerInput): void {
    const { keyspaceKey, keyType } = record;
    if (!isRegisteredKeyType(keyType)) {
      throw new OwnerRegistryError(
        `Cannot register keyspace key ${keyspaceKey} with key type ${keyTypeLabel(keyType)}`,
        'INVALID_KEY_TYPE',
        keyspaceKey,
      );
    }
    if (this.records.has(keyspaceKey)) {
      throw new OwnerRegistryError(`Keyspace key ${keyspaceKey} is already an owner`, 'ALREADY_OWNER', keyspaceKey);
    }
    this.records.set(keyspaceKey, keyType);
  }

  removeOwner(keyspaceKey: bigint): OwnerRecord {
    const keyType = this.records.get(keyspaceKey);
    if (keyType === undefined) {
      throw new OwnerRegistryError(`Keyspace key ${keyspaceKey} is not an owner`, 'NOT_OWNER', keyspaceKey);
    }
    if (this.records.size === 1) {
      throw new OwnerRegistryError(`Cannot remove the last owner ${keyspaceKey}`, 'LAST_OWNER', keyspaceKey);
    }
    this.records.delete(keyspaceKey);
    return { keyspaceKey, keyType };
  }

  async typeOf(keyspaceKey: bigint): Promise<KeyType> {
    return this.records.get(keyspaceKey) ?? KeyType.None;
  }

  async isRegistered(keyspaceKey: bigint): Promise<boolean> {
    return this.records.has(keyspaceKey);
  }
}
