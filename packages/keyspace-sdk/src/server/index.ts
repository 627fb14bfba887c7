import { createPublicClient, http, type PublicClient } from 'viem';
import type { KeyspaceConfig } from '../config';
import { ContractOwnerRegistry } from '../ContractOwnerRegistry';
import { publicClientContext } from '../executionContext';
import { KeyspaceAccount } from '../KeyspaceAccount';
import { StateProofClient } from '../StateProofClient';
import type { KeyspaceLogger } from '../types';

let _clientKey: string | null = null;
let _client: PublicClient | null = null;

export function getPublicClientSingleton(config: Pick<KeyspaceConfig, 'rpcUrl' | 'chain'>): PublicClient {
  const rpcUrl = String(config.rpcUrl || '').trim();
  if (!rpcUrl) throw new Error('rpcUrl is required');
  const key = `${rpcUrl}::${config.chain?.id ?? ''}`;
  if (!_client || _clientKey !== key) {
    _clientKey = key;
    _client = createPublicClient({ chain: config.chain, transport: http(rpcUrl) });
  }
  return _client;
}

/**
 * Builds an account that reads owners from the deployed account contract and
 * resolves key material through the configured directory and proof verifier.
 */
export function createKeyspaceAccount(
  config: KeyspaceConfig,
  options: { client?: PublicClient; logger?: KeyspaceLogger } = {},
): KeyspaceAccount {
  const client = options.client ?? getPublicClientSingleton(config);
  return new KeyspaceAccount({
    context: publicClientContext(client, config.accountAddress),
    owners: new ContractOwnerRegistry(config.accountAddress, client),
    oracle: new StateProofClient(client, {
      directoryAddress: config.directoryAddress,
      verifierAddress: config.verifierAddress,
    }),
    client,
    requireUserVerification: config.requireUserVerification,
    logger: options.logger,
  });
}
