import { ERC1271_MAGIC_VALUE } from '../constants';
import type { KeyspaceAccount } from '../KeyspaceAccount';
import { keyTypeLabel } from '../keyTypes';
import type { OwnerRegistry } from '../ownerRegistry';
import { USAGE, type CliCommand } from './args';

export type CliDeps = {
  account: KeyspaceAccount;
  owners: OwnerRegistry;
};

export type CliOutput = {
  log(line: string): void;
};

function toJson(value: unknown): string {
  return JSON.stringify(value, (_key, v) => (typeof v === 'bigint' ? v.toString() : v), 2);
}

/**
 * Runs one parsed command and returns the process exit code.
 */
export async function runCommand(command: CliCommand, deps: CliDeps, out: CliOutput): Promise<number> {
  switch (command.kind) {
    case 'help':
      out.log(USAGE);
      return 0;
    case 'domain': {
      const domain = await deps.account.eip712Domain();
      const separator = await deps.account.domainSeparator();
      out.log(toJson({ ...domain, domainSeparator: separator }));
      return 0;
    }
    case 'replay-safe-hash':
      out.log(await deps.account.replaySafeHash(command.hash));
      return 0;
    case 'owner-type': {
      const keyType = await deps.owners.typeOf(command.keyspaceKey);
      out.log(`${command.keyspaceKey}: ${keyTypeLabel(keyType)}`);
      return 0;
    }
    case 'verify': {
      const result = await deps.account.isValidSignature(command.hash, command.signature);
      const valid = result === ERC1271_MAGIC_VALUE;
      out.log(`${valid ? 'valid' : 'invalid'} (${result})`);
      return valid ? 0 : 1;
    }
  }
}
