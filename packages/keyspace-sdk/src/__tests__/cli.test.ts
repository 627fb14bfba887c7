import { getAddress } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { describe, expect, it, vi } from 'vitest';
import { CliUsageError, USAGE, parseCliArgs } from '../cli/args';
import { runCommand } from '../cli/commands';
import { domainSeparator, replaySafeHash } from '../eip712';
import { fixedChainContext } from '../executionContext';
import { KeyType } from '../keyTypes';
import { KeyspaceAccount } from '../KeyspaceAccount';
import { InMemoryOwnerRegistry } from '../ownerRegistry';
import { signReplaySafe } from '../signing';
import { StateProofClient } from '../StateProofClient';
import { FakeChain, directoryContract, proofVerifierContract, silentLogger } from './helpers';
import {
  ACCOUNT_ADDRESS,
  APP_HASH,
  DIRECTORY_ADDRESS,
  EOA_PRIVATE_KEY,
  KEYSPACE_KEY_EOA,
  ROOT_A,
  TEST_CHAIN_ID,
  TEST_PROOF,
  VERIFIER_ADDRESS,
} from './test-data';

describe('parseCliArgs', () => {
  it('defaults to help', () => {
    expect(parseCliArgs([])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['--help'])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['-h'])).toEqual({ kind: 'help' });
  });

  it('parses each command', () => {
    expect(parseCliArgs(['domain'])).toEqual({ kind: 'domain' });
    expect(parseCliArgs(['replay-safe-hash', APP_HASH])).toEqual({ kind: 'replay-safe-hash', hash: APP_HASH });
    expect(parseCliArgs(['owner-type', '0x10'])).toEqual({ kind: 'owner-type', keyspaceKey: 16n });
    expect(parseCliArgs(['verify', APP_HASH, '0xabcd'])).toEqual({ kind: 'verify', hash: APP_HASH, signature: '0xabcd' });
  });

  it('rejects bad input with a usage error', () => {
    expect(() => parseCliArgs(['deploy'])).toThrow(new CliUsageError('Unknown command "deploy"'));
    expect(() => parseCliArgs(['replay-safe-hash', '0x1234'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['owner-type', 'abc'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['owner-type', '-1'])).toThrow(new CliUsageError('<keyspaceKey> must fit in uint256'));
    expect(() => parseCliArgs(['verify', APP_HASH])).toThrow(new CliUsageError('Missing <signature>'));
  });
});

describe('runCommand', () => {
  function setup() {
    const chain = new FakeChain(TEST_CHAIN_ID);
    chain.deploy(DIRECTORY_ADDRESS, directoryContract(() => ROOT_A));
    chain.deploy(VERIFIER_ADDRESS, proofVerifierContract(() => true));
    const client = chain.client();
    const owners = new InMemoryOwnerRegistry([{ keyspaceKey: KEYSPACE_KEY_EOA, keyType: KeyType.Secp256k1 }]);
    const account = new KeyspaceAccount({
      context: fixedChainContext(ACCOUNT_ADDRESS, TEST_CHAIN_ID),
      owners,
      oracle: new StateProofClient(client, { directoryAddress: DIRECTORY_ADDRESS, verifierAddress: VERIFIER_ADDRESS }),
      client,
      logger: silentLogger(),
    });
    const out = { log: vi.fn() };
    return { deps: { account, owners }, out };
  }

  const ctx = { chainId: TEST_CHAIN_ID, verifyingContract: ACCOUNT_ADDRESS };

  it('prints usage for help', async () => {
    const { deps, out } = setup();
    await expect(runCommand({ kind: 'help' }, deps, out)).resolves.toBe(0);
    expect(out.log).toHaveBeenCalledWith(USAGE);
  });

  it('prints the domain as JSON', async () => {
    const { deps, out } = setup();
    await expect(runCommand({ kind: 'domain' }, deps, out)).resolves.toBe(0);

    const printed: unknown = JSON.parse(String(out.log.mock.calls[0]?.[0]));
    expect(printed).toEqual({
      fields: '0x0f',
      name: 'Coinbase Smart Wallet',
      version: '1',
      chainId: '84532',
      verifyingContract: getAddress(ACCOUNT_ADDRESS),
      salt: '0x0000000000000000000000000000000000000000000000000000000000000000',
      extensions: [],
      domainSeparator: domainSeparator(ctx),
    });
  });

  it('prints the replay-safe hash and owner type', async () => {
    const { deps, out } = setup();
    await runCommand({ kind: 'replay-safe-hash', hash: APP_HASH }, deps, out);
    await runCommand({ kind: 'owner-type', keyspaceKey: KEYSPACE_KEY_EOA }, deps, out);
    await runCommand({ kind: 'owner-type', keyspaceKey: 5n }, deps, out);

    expect(out.log.mock.calls).toEqual([[replaySafeHash(ctx, APP_HASH)], ['1001: secp256k1'], ['5: none']]);
  });

  it('exits 0 for a valid signature and 1 otherwise', async () => {
    const { deps, out } = setup();
    const signature = await signReplaySafe({
      account: privateKeyToAccount(EOA_PRIVATE_KEY),
      domain: ctx,
      hash: APP_HASH,
      keyspaceKey: KEYSPACE_KEY_EOA,
      stateProof: TEST_PROOF,
    });

    await expect(runCommand({ kind: 'verify', hash: APP_HASH, signature }, deps, out)).resolves.toBe(0);
    await expect(runCommand({ kind: 'verify', hash: APP_HASH, signature: '0x' }, deps, out)).resolves.toBe(1);
    expect(out.log.mock.calls).toEqual([['valid (0x1626ba7e)'], ['invalid (0xffffffff)']]);
  });
});
