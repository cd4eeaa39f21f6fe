import type { IKmsClient } from './kms-client.js';
import { UnsupportedKeyError } from './errors.js';
import { decodePublicKey, deriveKeyId } from './key-util.js';
import { withRetry, type RetryInfo, type RetryPolicy, type Sleep } from './retry.js';
import type { CallOptions, KeyDescriptor, KeyReference, SigningAlgorithm } from './types.js';

const KNOWN_SIGNING_ALGORITHMS: ReadonlySet<string> = new Set<SigningAlgorithm>([
  'RSASSA_PSS_SHA_256',
  'RSASSA_PSS_SHA_384',
  'RSASSA_PSS_SHA_512',
  'RSASSA_PKCS1_V1_5_SHA_256',
  'RSASSA_PKCS1_V1_5_SHA_384',
  'RSASSA_PKCS1_V1_5_SHA_512',
  'ECDSA_SHA_256',
  'ECDSA_SHA_384',
  'ECDSA_SHA_512',
]);

export interface KeyDescriptorResolverConfig {
  retryPolicy?: RetryPolicy;
  onRetry?: (info: RetryInfo) => void;
  sleep?: Sleep;
}

/**
 * Fetches a remote public key and turns it into a KeyDescriptor. Stateless:
 * caching is the owning signer's concern.
 */
export class KeyDescriptorResolver {
  private readonly kmsClient: IKmsClient;
  private readonly config: KeyDescriptorResolverConfig;

  constructor(kmsClient: IKmsClient, config: KeyDescriptorResolverConfig = {}) {
    this.kmsClient = kmsClient;
    this.config = config;
  }

  async resolve(keyReference: KeyReference, options: CallOptions = {}): Promise<KeyDescriptor> {
    const response = await withRetry(
      () => this.kmsClient.getPublicKey(keyReference.resourceId, options.signal),
      {
        operation: 'GetPublicKey',
        keyReference: keyReference.uri,
        policy: this.config.retryPolicy,
        signal: options.signal,
        onRetry: this.config.onRetry,
        sleep: this.config.sleep,
      },
    );

    if (response.keyUsage !== undefined && response.keyUsage !== 'SIGN_VERIFY') {
      throw new UnsupportedKeyError(
        `Key ${keyReference.uri} has usage ${response.keyUsage}, expected SIGN_VERIFY`,
      );
    }

    const decoded = decodePublicKey(response.publicKey, keyReference.uri);

    return Object.freeze({
      keyReference,
      publicKeyDer: decoded.der,
      algorithmFamily: decoded.family,
      keySize: decoded.keySize,
      curve: decoded.curve,
      derivedKeyId: deriveKeyId(decoded.der),
      signingAlgorithms: Object.freeze(response.signingAlgorithms.filter(isSigningAlgorithm)),
    });
  }
}

function isSigningAlgorithm(value: string): value is SigningAlgorithm {
  return KNOWN_SIGNING_ALGORITHMS.has(value);
}
