import { AwsKmsClient, type AwsKmsClientConfig, type IKmsClient } from './kms-client.js';
import { KmsSigner, type KmsSignerConfig } from './kms-signer.js';
import { parseKeyReference } from './key-reference.js';
import { SignerNotRegisteredError, UnsupportedSchemeError } from './errors.js';
import type { KeyReference, Signer } from './types.js';

export type SignerFactory = (keyReference: KeyReference) => Signer;

/**
 * Maps key-reference URIs to Signer instances, dispatching on URI scheme.
 * Unknown schemes are rejected when a key is registered, never at sign time.
 */
export class SignerRegistry {
  private readonly factories = new Map<string, SignerFactory>();
  private readonly signers = new Map<string, Signer>();

  registerScheme(scheme: string, factory: SignerFactory): this {
    this.factories.set(scheme.toLowerCase(), factory);
    return this;
  }

  hasScheme(scheme: string): boolean {
    return this.factories.has(scheme.toLowerCase());
  }

  /**
   * Construct (or return the already registered) signer for a URI. No
   * network traffic happens here.
   */
  register(uri: string): Signer {
    const existing = this.signers.get(uri);
    if (existing) return existing;

    const keyReference = parseKeyReference(uri);
    const factory = this.factories.get(keyReference.scheme);
    if (!factory) {
      throw new UnsupportedSchemeError(keyReference.scheme);
    }

    const signer = factory(keyReference);
    this.signers.set(uri, signer);
    return signer;
  }

  get(uri: string): Signer {
    const signer = this.signers.get(uri);
    if (!signer) throw new SignerNotRegisteredError(uri);
    return signer;
  }
}

export interface DefaultRegistryOptions {
  /** Region used when a key reference names none. */
  region?: string;
  signer?: Omit<KmsSignerConfig, 'keyReference'>;
  createClient?: (config: AwsKmsClientConfig) => IKmsClient;
}

export const KMS_SCHEMES = ['kms', 'aws-kms'] as const;

/**
 * Registry with the KMS schemes wired to AwsKmsClient. Clients are shared per
 * (region, profile) pair.
 */
export function createDefaultRegistry(options: DefaultRegistryOptions = {}): SignerRegistry {
  const createClient = options.createClient ?? ((config) => new AwsKmsClient(config));
  const clients = new Map<string, IKmsClient>();

  const clientFor = (keyReference: KeyReference): IKmsClient => {
    const region = keyReference.region ?? options.region;
    const profile = keyReference.profile;
    const cacheKey = `${region ?? ''}|${profile ?? ''}`;
    let client = clients.get(cacheKey);
    if (!client) {
      client = createClient({ region, profile });
      clients.set(cacheKey, client);
    }
    return client;
  };

  const registry = new SignerRegistry();
  for (const scheme of KMS_SCHEMES) {
    registry.registerScheme(
      scheme,
      (keyReference) => new KmsSigner(clientFor(keyReference), { ...options.signer, keyReference }),
    );
  }
  return registry;
}
