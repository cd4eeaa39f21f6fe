import {
  DescribeKeyCommand,
  GetPublicKeyCommand,
  KMSClient,
  type KMSClientConfig,
  SignCommand,
} from '@aws-sdk/client-kms';
import { RemoteServiceError, type ServiceOperation } from './errors.js';
import type { SigningAlgorithm } from './types.js';

export interface KmsKeyMetadata {
  keySpec: string;
  keyUsage: string;
  keyState: string;
}

export interface KmsPublicKey {
  /** DER-encoded SubjectPublicKeyInfo. */
  publicKey: Uint8Array;
  signingAlgorithms: string[];
  keySpec?: string;
  keyUsage?: string;
}

/**
 * Outbound port to the key-management service. Implementations throw
 * RemoteServiceError so callers can tell transient from permanent failures.
 */
export interface IKmsClient {
  getPublicKey(keyId: string, signal?: AbortSignal): Promise<KmsPublicKey>;
  sign(
    keyId: string,
    digest: Uint8Array,
    algorithm: SigningAlgorithm,
    signal?: AbortSignal,
  ): Promise<Uint8Array>;
  describeKey(keyId: string, signal?: AbortSignal): Promise<KmsKeyMetadata>;
}

export interface AwsKmsClientConfig {
  region?: string;
  profile?: string;
}

export class AwsKmsClient implements IKmsClient {
  private client: KMSClient;

  constructor(config: AwsKmsClientConfig = {}) {
    // Single SDK attempt; withRetry owns retrying.
    const clientConfig: KMSClientConfig = { maxAttempts: 1 };
    if (config.region) clientConfig.region = config.region;
    if (config.profile) clientConfig.profile = config.profile;
    this.client = new KMSClient(clientConfig);
  }

  async getPublicKey(keyId: string, signal?: AbortSignal): Promise<KmsPublicKey> {
    const command = new GetPublicKeyCommand({ KeyId: keyId });
    const response = await this.send('GetPublicKey', keyId, () =>
      this.client.send(command, { abortSignal: signal }),
    );

    if (!response.PublicKey) {
      throw missingField('GetPublicKey', keyId, 'PublicKey');
    }

    return {
      publicKey: new Uint8Array(response.PublicKey),
      signingAlgorithms: response.SigningAlgorithms ?? [],
      keySpec: response.KeySpec,
      keyUsage: response.KeyUsage,
    };
  }

  async sign(
    keyId: string,
    digest: Uint8Array,
    algorithm: SigningAlgorithm,
    signal?: AbortSignal,
  ): Promise<Uint8Array> {
    const command = new SignCommand({
      KeyId: keyId,
      Message: digest,
      SigningAlgorithm: algorithm,
      MessageType: 'DIGEST',
    });
    const response = await this.send('Sign', keyId, () =>
      this.client.send(command, { abortSignal: signal }),
    );

    if (!response.Signature) {
      throw missingField('Sign', keyId, 'Signature');
    }

    return new Uint8Array(response.Signature);
  }

  async describeKey(keyId: string, signal?: AbortSignal): Promise<KmsKeyMetadata> {
    const command = new DescribeKeyCommand({ KeyId: keyId });
    const response = await this.send('DescribeKey', keyId, () =>
      this.client.send(command, { abortSignal: signal }),
    );

    if (!response.KeyMetadata) {
      throw missingField('DescribeKey', keyId, 'KeyMetadata');
    }

    return {
      keySpec: response.KeyMetadata.KeySpec ?? 'UNKNOWN',
      keyUsage: response.KeyMetadata.KeyUsage ?? 'UNKNOWN',
      keyState: response.KeyMetadata.KeyState ?? 'UNKNOWN',
    };
  }

  private async send<T>(
    operation: ServiceOperation,
    keyId: string,
    call: () => Promise<T>,
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw classifyKmsError(error, operation, keyId);
    }
  }
}

const TRANSIENT_ERROR_NAMES = new Set([
  'ThrottlingException',
  'KMSInternalException',
  'DependencyTimeoutException',
  'KeyUnavailableException',
  'TimeoutError',
  'RequestTimeout',
  'RequestTimeoutException',
]);

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EPIPE',
  'EAI_AGAIN',
]);

/**
 * Map any failure thrown by a KMS call to a RemoteServiceError. SDK service
 * exceptions carry `$fault`, `$retryable` and `$metadata.httpStatusCode`;
 * transport failures carry a Node error `code`.
 */
export function classifyKmsError(
  error: unknown,
  operation: ServiceOperation,
  keyReference: string,
): RemoteServiceError {
  if (error instanceof RemoteServiceError) return error;

  const name = readString(error, 'name');
  const code = readString(error, 'code');
  const serviceCode = name && name !== 'Error' ? name : code;

  return new RemoteServiceError({
    operation,
    keyReference,
    transient: isTransient(error, name, code),
    serviceCode,
    cause: error,
  });
}

function isTransient(error: unknown, name?: string, code?: string): boolean {
  if (name && TRANSIENT_ERROR_NAMES.has(name)) return true;
  if (code && TRANSIENT_NETWORK_CODES.has(code)) return true;
  if (!isRecord(error)) return false;

  if (isRecord(error.$retryable)) return true;
  if (error.$fault === 'server') return true;

  const metadata = error.$metadata;
  if (isRecord(metadata) && typeof metadata.httpStatusCode === 'number') {
    const status = metadata.httpStatusCode;
    return status === 429 || status >= 500;
  }
  return false;
}

function missingField(
  operation: ServiceOperation,
  keyReference: string,
  field: string,
): RemoteServiceError {
  return new RemoteServiceError({
    operation,
    keyReference,
    transient: false,
    serviceCode: `Missing${field}`,
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readString(value: unknown, key: string): string | undefined {
  if (!isRecord(value)) return undefined;
  const field = value[key];
  return typeof field === 'string' ? field : undefined;
}
