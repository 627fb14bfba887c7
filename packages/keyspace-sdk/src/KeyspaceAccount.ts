import type { Address, Hex, PublicClient } from 'viem';
import { ERC1271_INVALID_VALUE, ERC1271_MAGIC_VALUE, type Erc1271Result } from './constants';
import * as eip712 from './eip712';
import { MalformedWrapperError } from './errors';
import type { ExecutionContext } from './executionContext';
import { isRegisteredKeyType, keyTypeLabel } from './keyTypes';
import type { OwnerRegistry } from './ownerRegistry';
import { decodeOwnerPayload, decodeSignatureWrapper, encodeKeyMaterial } from './signatureWrapper';
import type { StateProofOracle } from './StateProofClient';
import type { DomainContext, Eip712DomainRecord, KeyspaceLogger, OwnerPayload, SignatureWrapper } from './types';
import { verifyOwnerSignature } from './verifiers';

export type KeyspaceAccountOptions = {
  context: ExecutionContext;
  owners: OwnerRegistry;
  oracle: StateProofOracle;
  /** Used for ERC-1271 owner calls and signer code lookups. */
  client: PublicClient;
  /** Require the WebAuthn user-verified flag on passkey assertions. Defaults to false. */
  requireUserVerification?: boolean;
  logger?: KeyspaceLogger;
};

type RejectReason = 'malformed-wrapper' | 'unregistered-key' | 'malformed-payload' | 'bad-signature' | 'proof-rejected';

/**
 * ERC-1271 signature authorization for an account whose owners are keyspace keys.
 *
 * `isValidSignature` runs, in order: wrapper decode, owner type lookup, payload decode,
 * local signature check over the replay-safe hash, directory root fetch, proof
 * confirmation. Each expected failure returns `0xffffffff` at the step where it
 * happens; the directory and proof verifier are only reached with a locally valid
 * signature. Failures of the directory, verifier or registry reads are rethrown.
 */
export class KeyspaceAccount {
  private readonly context: ExecutionContext;
  private readonly owners: OwnerRegistry;
  private readonly oracle: StateProofOracle;
  private readonly client: PublicClient;
  private readonly requireUserVerification: boolean;
  private readonly logger: KeyspaceLogger;

  constructor(options: KeyspaceAccountOptions) {
    this.context = options.context;
    this.owners = options.owners;
    this.oracle = options.oracle;
    this.client = options.client;
    this.requireUserVerification = options.requireUserVerification ?? false;
    this.logger = options.logger ?? console;
  }

  get address(): Address {
    return this.context.address;
  }

  private async domainContext(): Promise<DomainContext> {
    return {
      chainId: await this.context.getChainId(),
      verifyingContract: this.context.address,
    };
  }

  async eip712Domain(): Promise<Eip712DomainRecord> {
    return eip712.eip712Domain(await this.domainContext());
  }

  async domainSeparator(): Promise<Hex> {
    return eip712.domainSeparator(await this.domainContext());
  }

  async replaySafeHash(hash: Hex): Promise<Hex> {
    return eip712.replaySafeHash(await this.domainContext(), hash);
  }

  async isValidSignature(hash: Hex, signature: Hex): Promise<Erc1271Result> {
    eip712.assertHash(hash);

    let wrapper: SignatureWrapper;
    try {
      wrapper = decodeSignatureWrapper(signature);
    } catch (error) {
      if (!(error instanceof MalformedWrapperError)) throw error;
      return this.reject('malformed-wrapper', { error: error.message });
    }
    const { keyspaceKey } = wrapper;

    const keyType = await this.owners.typeOf(keyspaceKey);
    if (!isRegisteredKeyType(keyType)) {
      return this.reject('unregistered-key', { keyspaceKey });
    }

    let payload: OwnerPayload;
    try {
      payload = decodeOwnerPayload(keyType, wrapper.payload);
    } catch (error) {
      if (!(error instanceof MalformedWrapperError)) throw error;
      return this.reject('malformed-payload', { keyspaceKey, keyType: keyTypeLabel(keyType), error: error.message });
    }

    const digest = await this.replaySafeHash(hash);
    const locallyValid = await verifyOwnerSignature(
      this.client,
      { payload, hash: digest, requireUserVerification: this.requireUserVerification },
      this.logger,
    );
    if (!locallyValid) {
      return this.reject('bad-signature', { keyspaceKey, keyType: keyTypeLabel(keyType) });
    }

    const root = await this.oracle.currentRoot();
    const confirmed = await this.oracle.confirm({
      root,
      keyspaceKey,
      keyMaterial: encodeKeyMaterial(payload),
      proof: payload.stateProof,
    });
    if (!confirmed) {
      return this.reject('proof-rejected', { keyspaceKey, root });
    }

    return ERC1271_MAGIC_VALUE;
  }

  private reject(reason: RejectReason, context: Record<string, unknown>): Erc1271Result {
    this.logger.debug(`[KeyspaceAccount.isValidSignature] rejected: ${reason}`, context);
    return ERC1271_INVALID_VALUE;
  }
}
