export class MalformedWrapperError extends Error {
  constructor(
    message: string,
    public details?: unknown,
  ) {
    super(message);
    this.name = 'MalformedWrapperError';
  }
}

export class InvalidHashError extends Error {
  constructor(public value: string) {
    super(`Expected a 32-byte hex hash, got ${value}`);
    this.name = 'InvalidHashError';
  }
}

export type OwnerRegistryErrorCode = 'ALREADY_OWNER' | 'NOT_OWNER' | 'INVALID_KEY_TYPE' | 'LAST_OWNER';

export class OwnerRegistryError extends Error {
  constructor(
    message: string,
    public code: OwnerRegistryErrorCode,
    public keyspaceKey: bigint,
  ) {
    super(message);
    this.name = 'OwnerRegistryError';
  }
}

export class KeyspaceConfigError extends Error {
  constructor(
    message: string,
    public missing: string[] = [],
  ) {
    super(message);
    this.name = 'KeyspaceConfigError';
  }
}
