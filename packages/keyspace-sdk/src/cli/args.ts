import { isHex, size, type Hex } from 'viem';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'domain' }
  | { kind: 'replay-safe-hash'; hash: Hex }
  | { kind: 'owner-type'; keyspaceKey: bigint }
  | { kind: 'verify'; hash: Hex; signature: Hex };

export const USAGE = `Usage: keyspace-account <command> [args]

Commands:
  domain                          Print the account's EIP-712 domain and separator
  replay-safe-hash <hash>         Print the replay-safe hash of a 32-byte hash
  owner-type <keyspaceKey>        Print the key type registered for a keyspace key
  verify <hash> <signature>       Evaluate isValidSignature (exit 0 valid, 1 invalid)

Configuration is read from the environment (and .env):
  KEYSPACE_CHAIN_ID, KEYSPACE_RPC_URL, KEYSPACE_ACCOUNT_ADDRESS,
  KEYSPACE_DIRECTORY_ADDRESS, KEYSPACE_PROOF_VERIFIER_ADDRESS,
  KEYSPACE_REQUIRE_USER_VERIFICATION`;

function parseHash(value: string | undefined): Hex {
  if (!value) throw new CliUsageError('Missing <hash>');
  if (!isHex(value, { strict: true }) || size(value) !== 32) {
    throw new CliUsageError(`<hash> must be 32 bytes of 0x-prefixed hex, got "${value}"`);
  }
  return value;
}

function parseBytes(value: string | undefined, label: string): Hex {
  if (!value) throw new CliUsageError(`Missing <${label}>`);
  if (!isHex(value, { strict: true })) {
    throw new CliUsageError(`<${label}> must be 0x-prefixed hex`);
  }
  return value;
}

function parseKeyspaceKey(value: string | undefined): bigint {
  if (!value) throw new CliUsageError('Missing <keyspaceKey>');
  let key: bigint;
  try {
    key = BigInt(value);
  } catch {
    throw new CliUsageError(`<keyspaceKey> must be a decimal or 0x-prefixed integer, got "${value}"`);
  }
  if (key < 0n || key >= 2n ** 256n) {
    throw new CliUsageError('<keyspaceKey> must fit in uint256');
  }
  return key;
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;
  switch (command) {
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      return { kind: 'help' };
    case 'domain':
      return { kind: 'domain' };
    case 'replay-safe-hash':
      return { kind: 'replay-safe-hash', hash: parseHash(rest[0]) };
    case 'owner-type':
      return { kind: 'owner-type', keyspaceKey: parseKeyspaceKey(rest[0]) };
    case 'verify':
      return { kind: 'verify', hash: parseHash(rest[0]), signature: parseBytes(rest[1], 'signature') };
    default:
      throw new CliUsageError(`Unknown command "${command}"`);
  }
}
