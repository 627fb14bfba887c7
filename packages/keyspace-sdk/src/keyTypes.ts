// Key-type tags registered against a keyspace key on the account.
//
// Note: these mirror the account's uint8 enum; 0 is the "not an owner" sentinel.

export const KeyType = {
  None: 0,
  Secp256k1: 1, // EOA or ERC-1271 contract signer
  WebAuthn: 2, // passkey (P-256)
} as const;

export type KeyType = (typeof KeyType)[keyof typeof KeyType];

export type RegisteredKeyType = Exclude<KeyType, typeof KeyType.None>;

const KEY_TYPE_LABELS: Record<KeyType, string> = {
  [KeyType.None]: 'none',
  [KeyType.Secp256k1]: 'secp256k1',
  [KeyType.WebAuthn]: 'webauthn',
};

export function isRegisteredKeyType(value: KeyType): value is RegisteredKeyType {
  return value === KeyType.Secp256k1 || value === KeyType.WebAuthn;
}

// Anything outside the enum reads as None so it can never authorize.
export function toKeyType(value: number | bigint): KeyType {
  const n = typeof value === 'bigint' ? value : BigInt(value);
  if (n === 1n) return KeyType.Secp256k1;
  if (n === 2n) return KeyType.WebAuthn;
  return KeyType.None;
}

export function keyTypeLabel(keyType: KeyType): string {
  return KEY_TYPE_LABELS[keyType];
}
