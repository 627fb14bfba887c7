/**
 * Test helpers: an in-process chain behind viem's custom transport, fake contracts,
 * and a passkey authenticator.
 *
 * Nothing here opens a socket; every RPC request is answered by FakeChain.
 */

import { p256 } from '@noble/curves/p256';
import { vi } from 'vitest';
import {
  bytesToBigInt,
  concatHex,
  createPublicClient,
  custom,
  decodeFunctionData,
  encodeFunctionResult,
  getAddress,
  hexToBytes,
  HttpRequestError,
  isAddressEqual,
  isHex,
  numberToHex,
  type Address,
  type Hex,
  type PublicClient,
} from 'viem';
import { erc1271Abi, keyDirectoryAbi, keyspaceAccountAbi, stateProofVerifierAbi } from '../abi';
import type { ProofConfirmation, WebAuthnAuth, WebAuthnPublicKey } from '../types';
import { webAuthnChallengeFor } from '../signing';
import { webAuthnMessageHash } from '../verifiers/webauthn';
import { PASSKEY_PRIVATE_KEY } from './test-data';

export type EthCall = { to: Address; data: Hex };
export type CallHandler = (data: Hex) => Hex;

type RpcRequest = { method: string; params?: readonly unknown[] };

export class RevertError extends Error {
  code = 3;

  constructor(public data: Hex = '0x') {
    super('execution reverted');
    this.name = 'RevertError';
  }
}

function toEthCall(value: unknown): EthCall {
  if (typeof value === 'object' && value !== null && 'to' in value && 'data' in value) {
    const { to, data } = value;
    if (typeof to === 'string' && isHex(data)) {
      return { to: getAddress(to), data };
    }
  }
  throw new Error('FakeChain: malformed eth_call');
}

export class FakeChain {
  readonly requests: string[] = [];
  readonly calls: EthCall[] = [];
  private readonly code = new Map<string, Hex>();
  private readonly handlers = new Map<string, CallHandler>();

  constructor(public chainId: number) {}

  deploy(address: Address, handler: CallHandler, code: Hex = '0x6080604052'): void {
    this.code.set(address.toLowerCase(), code);
    this.handlers.set(address.toLowerCase(), handler);
  }

  callsTo(address: Address): EthCall[] {
    return this.calls.filter((call) => isAddressEqual(call.to, address));
  }

  client(): PublicClient {
    return createPublicClient({
      transport: custom({ request: (request: RpcRequest) => this.request(request) }, { retryCount: 0 }),
    });
  }

  private async request({ method, params = [] }: RpcRequest): Promise<unknown> {
    this.requests.push(method);
    switch (method) {
      case 'eth_chainId':
        return numberToHex(this.chainId);
      case 'eth_getCode': {
        const [address] = params;
        return typeof address === 'string' ? (this.code.get(address.toLowerCase()) ?? '0x') : '0x';
      }
      case 'eth_call': {
        const call = toEthCall(params[0]);
        this.calls.push(call);
        const handler = this.handlers.get(call.to.toLowerCase());
        return handler ? handler(call.data) : '0x';
      }
      default:
        throw new Error(`FakeChain: unsupported method ${method}`);
    }
  }
}

export function directoryContract(currentRoot: () => Hex): CallHandler {
  return (data) => {
    decodeFunctionData({ abi: keyDirectoryAbi, data });
    return encodeFunctionResult({ abi: keyDirectoryAbi, functionName: 'root', result: currentRoot() });
  };
}

export function proofVerifierContract(decide: (confirmation: ProofConfirmation) => boolean): CallHandler {
  return (data) => {
    const { args } = decodeFunctionData({ abi: stateProofVerifierAbi, data });
    const [root, keyspaceKey, keyMaterial, proof] = args;
    const result = decide({ root, keyspaceKey, keyMaterial, proof });
    return encodeFunctionResult({ abi: stateProofVerifierAbi, functionName: 'verify', result });
  };
}

/**
 * An ERC-1271 owner that approves exactly one (hash, signature) pair.
 */
export function erc1271Contract(approvedHash: Hex, approvedSignature: Hex): CallHandler {
  return (data) => {
    const { args } = decodeFunctionData({ abi: erc1271Abi, data });
    const [hash, signature] = args;
    const approved =
      hash.toLowerCase() === approvedHash.toLowerCase() &&
      signature.toLowerCase() === approvedSignature.toLowerCase();
    const result = approved ? '0x1626ba7e' : '0xffffffff';
    return encodeFunctionResult({ abi: erc1271Abi, functionName: 'isValidSignature', result });
  };
}

export function ownerKeyTypeContract(keyTypes: ReadonlyMap<bigint, number>): CallHandler {
  return (data) => {
    const { args } = decodeFunctionData({ abi: keyspaceAccountAbi, data });
    const [keyspaceKey] = args;
    return encodeFunctionResult({
      abi: keyspaceAccountAbi,
      functionName: 'ownerKeyType',
      result: keyTypes.get(keyspaceKey) ?? 0,
    });
  };
}

export function revertingContract(): CallHandler {
  return () => {
    throw new RevertError();
  };
}

/**
 * A node that answers `eth_call` for this address with an HTTP failure.
 */
export function unavailableContract(status = 503): CallHandler {
  return () => {
    throw new HttpRequestError({ url: 'http://127.0.0.1:8545', status, details: 'Service Unavailable' });
  };
}

/**
 * EIP-7702 delegation designator: `0xef0100 || delegate`.
 */
export function delegationCode(delegate: Address): Hex {
  return concatHex(['0xef0100', delegate]);
}

export function silentLogger() {
  return { debug: vi.fn(), warn: vi.fn() };
}

export function passkeyPublicKey(): WebAuthnPublicKey {
  const point = p256.getPublicKey(hexToBytes(PASSKEY_PRIVATE_KEY), false);
  return { x: bytesToBigInt(point.slice(1, 33)), y: bytesToBigInt(point.slice(33, 65)) };
}

/**
 * Produces a passkey assertion over `challenge`, as a platform authenticator would.
 */
export function passkeyAssertion(
  challenge: Hex,
  options: { flags?: number; clientDataJSON?: string } = {},
): WebAuthnAuth {
  const clientDataJSON =
    options.clientDataJSON ??
    `{"type":"webauthn.get","challenge":"${webAuthnChallengeFor(challenge)}","origin":"https://wallet.example","crossOrigin":false}`;
  const rpIdHash: Hex = `0x${'49'.repeat(32)}`;
  const authenticatorData = concatHex([rpIdHash, numberToHex(options.flags ?? 0x05, { size: 1 }), '0x00000001']);
  const digest = webAuthnMessageHash(authenticatorData, clientDataJSON);
  const signature = p256.sign(hexToBytes(digest), hexToBytes(PASSKEY_PRIVATE_KEY), { lowS: true });
  return {
    authenticatorData,
    clientDataJSON,
    challengeIndex: BigInt(clientDataJSON.indexOf('"challenge"')),
    typeIndex: BigInt(clientDataJSON.indexOf('"type"')),
    r: signature.r,
    s: signature.s,
  };
}
