import { derToPem } from './key-util.js';
import type { SigningScheme } from './signing-engine.js';
import type { EcCurve, KeyDescriptor, RsaPadding } from './types.js';

export interface MetadataKey {
  keytype: 'rsa' | 'ecdsa';
  scheme: string;
  keyval: { public: string };
}

const ECDSA_SCHEMES: Readonly<Record<EcCurve, string>> = {
  'P-256': 'ecdsa-sha2-nistp256',
  'P-384': 'ecdsa-sha2-nistp384',
  'P-521': 'ecdsa-sha2-nistp521',
  secp256k1: 'ecdsa-sha2-secp256k1',
};

const RSA_PADDING_NAMES: Readonly<Record<RsaPadding, string>> = {
  pss: 'rsassa-pss',
  'pkcs1-v1_5': 'rsassa-pkcs1v15',
};

const DEFAULT_SCHEME: SigningScheme = { digest: 'sha256', rsaPadding: 'pss' };

/**
 * Key object as embedded in signed metadata, with the public key as SPKI PEM.
 * RSA schemes name both the padding and the digest the signer uses, so pass
 * the signer's `signingScheme`.
 */
export function toMetadataKey(descriptor: KeyDescriptor, scheme: SigningScheme = DEFAULT_SCHEME): MetadataKey {
  const pem = derToPem(descriptor.publicKeyDer);
  if (descriptor.algorithmFamily === 'rsa') {
    const rsaScheme = `${RSA_PADDING_NAMES[scheme.rsaPadding]}-${scheme.digest}`;
    return { keytype: 'rsa', scheme: rsaScheme, keyval: { public: pem } };
  }
  const curve = descriptor.curve ?? 'P-256';
  return { keytype: 'ecdsa', scheme: ECDSA_SCHEMES[curve], keyval: { public: pem } };
}
