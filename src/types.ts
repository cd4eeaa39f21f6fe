export type KeyFamily = 'rsa' | 'ecdsa';

export type EcCurve = 'P-256' | 'P-384' | 'P-521' | 'secp256k1';

export type DigestAlgorithm = 'sha256' | 'sha384' | 'sha512';

export type RsaPadding = 'pss' | 'pkcs1-v1_5';

export type SigningAlgorithm =
  | 'RSASSA_PSS_SHA_256'
  | 'RSASSA_PSS_SHA_384'
  | 'RSASSA_PSS_SHA_512'
  | 'RSASSA_PKCS1_V1_5_SHA_256'
  | 'RSASSA_PKCS1_V1_5_SHA_384'
  | 'RSASSA_PKCS1_V1_5_SHA_512'
  | 'ECDSA_SHA_256'
  | 'ECDSA_SHA_384'
  | 'ECDSA_SHA_512';

export type SignatureEncoding = 'der' | 'ieee-p1363' | 'raw';

export interface KeyReference {
  readonly uri: string;
  readonly scheme: string;
  readonly resourceId: string;
  readonly region?: string;
  readonly profile?: string;
}

export interface KeyDescriptor {
  readonly keyReference: KeyReference;
  /** Canonical SubjectPublicKeyInfo DER. */
  readonly publicKeyDer: Uint8Array;
  readonly algorithmFamily: KeyFamily;
  /** RSA modulus length in bits. */
  readonly keySize?: number;
  readonly curve?: EcCurve;
  /** Lowercase hex SHA-256 of publicKeyDer. */
  readonly derivedKeyId: string;
  /** Algorithms the service reports for this key; empty when it reports none. */
  readonly signingAlgorithms: readonly SigningAlgorithm[];
}

export interface SignRequest {
  readonly keyReference: KeyReference;
  readonly digest: Uint8Array;
  readonly algorithm: SigningAlgorithm;
}

export interface Signature {
  readonly bytes: Uint8Array;
  readonly algorithm: SigningAlgorithm;
  readonly encoding: SignatureEncoding;
  readonly keyId: string;
}

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * The signing capability a metadata framework consumes. One implementation per
 * key source, selected by key-reference URI scheme.
 */
export interface Signer {
  publicKey(options?: CallOptions): Promise<KeyDescriptor>;
  sign(message: Uint8Array, options?: CallOptions): Promise<Signature>;
}
