export type {
  CallOptions,
  DigestAlgorithm,
  EcCurve,
  KeyDescriptor,
  KeyFamily,
  KeyReference,
  RsaPadding,
  Signature,
  SignatureEncoding,
  Signer,
  SigningAlgorithm,
  SignRequest,
} from './types.js';

export {
  CancelledError,
  HealthCheckError,
  InvalidSignatureEncodingError,
  KeyFormatError,
  KeyReferenceError,
  RemoteServiceError,
  SignerError,
  SignerNotRegisteredError,
  UnsupportedAlgorithmError,
  UnsupportedKeyError,
  UnsupportedSchemeError,
  type CancelReason,
  type RemoteServiceErrorInit,
  type ServiceOperation,
} from './errors.js';

export {
  AwsKmsClient,
  classifyKmsError,
  type AwsKmsClientConfig,
  type IKmsClient,
  type KmsKeyMetadata,
  type KmsPublicKey,
} from './kms-client.js';

export {
  DEFAULT_RETRY_POLICY,
  abortable,
  computeBackoffDelay,
  createRetryPolicy,
  withRetry,
  type RetryContext,
  type RetryInfo,
  type RetryPolicy,
  type RetryPolicyInput,
  type Sleep,
} from './retry.js';

export {
  decodePublicKey,
  deriveKeyId,
  derToP1363,
  derToPem,
  parseDerSignature,
} from './key-util.js';

export { parseKeyReference } from './key-reference.js';
export { KeyDescriptorResolver, type KeyDescriptorResolverConfig } from './descriptor-resolver.js';
export {
  SIGNING_ALGORITHM_TABLE,
  SigningEngine,
  selectSigningAlgorithm,
  type SigningEngineConfig,
  type SigningScheme,
} from './signing-engine.js';
export { KmsSigner, type KmsSignerConfig } from './kms-signer.js';
export {
  KMS_SCHEMES,
  SignerRegistry,
  createDefaultRegistry,
  type DefaultRegistryOptions,
  type SignerFactory,
} from './registry.js';
export { toMetadataKey, type MetadataKey } from './metadata-key.js';
export { AuditLogger, type AuditLoggerOptions, type AuditAction, type AuditEntry, type AuditSink } from './audit/index.js';
