import { getAddress, type Address, type Hex, type PublicClient } from 'viem';
import { keyDirectoryAbi, stateProofVerifierAbi } from './abi';
import type { ProofConfirmation } from './types';

/**
 * What the authorization path needs from the key directory and its proof verifier.
 */
export interface StateProofOracle {
  currentRoot(): Promise<Hex>;
  confirm(params: ProofConfirmation): Promise<boolean>;
}

/**
 * Reads the key directory root and asks the proof verifier to confirm bindings.
 *
 * Nothing is cached: the directory can rotate between any two calls. Errors from
 * either contract are surfaced as thrown by viem.
 */
export class StateProofClient implements StateProofOracle {
  readonly directoryAddress: Address;
  readonly verifierAddress: Address;

  constructor(
    private readonly client: PublicClient,
    params: { directoryAddress: Address; verifierAddress: Address },
  ) {
    this.directoryAddress = getAddress(params.directoryAddress);
    this.verifierAddress = getAddress(params.verifierAddress);
  }

  async currentRoot(): Promise<Hex> {
    return this.client.readContract({
      address: this.directoryAddress,
      abi: keyDirectoryAbi,
      functionName: 'root',
    });
  }

  async confirm({ root, keyspaceKey, keyMaterial, proof }: ProofConfirmation): Promise<boolean> {
    return this.client.readContract({
      address: this.verifierAddress,
      abi: stateProofVerifierAbi,
      functionName: 'verify',
      args: [root, keyspaceKey, keyMaterial, proof],
    });
  }
}
