export * from './abi';
export * from './constants';
export * from './errors';
export * from './keyTypes';
export type * from './types';
export {
  assertHash,
  domainSeparator,
  eip712Domain,
  hashReplaySafeStruct,
  replaySafeHash,
  replaySafeTypedData,
} from './eip712';
export { fixedChainContext, publicClientContext, type ExecutionContext } from './executionContext';
export { InMemoryOwnerRegistry, type OwnerInput, type OwnerRegistry } from './ownerRegistry';
export { ContractOwnerRegistry } from './ContractOwnerRegistry';
export {
  decodeOwnerPayload,
  decodeSignatureWrapper,
  encodeKeyMaterial,
  encodeOwnerPayload,
  encodeSignatureWrapper,
} from './signatureWrapper';
export * from './verifiers';
export { StateProofClient, type StateProofOracle } from './StateProofClient';
export { KeyspaceAccount, type KeyspaceAccountOptions } from './KeyspaceAccount';
export { signReplaySafe, webAuthnChallengeFor, wrapSecp256k1Signature, wrapWebAuthnSignature } from './signing';
export {
  CHAIN_CONFIG,
  DEFAULT_CHAIN_ID,
  getChainById,
  getChainEnvVarDetails,
  loadKeyspaceConfig,
  type Env,
  type KeyspaceConfig,
  type SupportedChainId,
} from './config';
export { createKeyspaceAccount, getPublicClientSingleton } from './server';
