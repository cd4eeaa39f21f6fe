import type { IKmsClient } from './kms-client.js';
import type { AuditAction, AuditSink } from './audit/types.js';
import { CancelledError, HealthCheckError, SignerError } from './errors.js';
import { KeyDescriptorResolver } from './descriptor-resolver.js';
import { SigningEngine, type SigningScheme } from './signing-engine.js';
import {
  abortable,
  createRetryPolicy,
  withRetry,
  type RetryInfo,
  type RetryPolicy,
  type RetryPolicyInput,
  type Sleep,
} from './retry.js';
import type {
  CallOptions,
  DigestAlgorithm,
  KeyDescriptor,
  KeyReference,
  RsaPadding,
  Signature,
  Signer,
} from './types.js';

export const SUPPORTED_KEY_SPECS: readonly string[] = [
  'RSA_2048',
  'RSA_3072',
  'RSA_4096',
  'ECC_NIST_P256',
  'ECC_NIST_P384',
  'ECC_NIST_P521',
  'ECC_SECG_P256K1',
];

export interface KmsSignerConfig {
  keyReference: KeyReference;
  digest?: DigestAlgorithm;
  rsaPadding?: RsaPadding;
  ecdsaSignatureEncoding?: 'der' | 'ieee-p1363';
  retryPolicy?: RetryPolicyInput;
  /** Health check fails when the derived key id differs. */
  expectedKeyId?: string;
  auditSink?: AuditSink;
  /** Identity recorded in audit entries. */
  caller?: string;
  sleep?: Sleep;
}

const SERVICE = 'kms-key-source';

interface PendingResolution {
  promise: Promise<KeyDescriptor>;
  controller: AbortController;
  /** Callers still waiting; the fetch is aborted when this reaches zero by cancellation. */
  waiters: number;
}

/**
 * Signer backed by a KMS asymmetric key. The key is bound at construction
 * time; nothing touches the network until the first publicKey() or sign().
 */
export class KmsSigner implements Signer {
  readonly keyReference: KeyReference;
  private readonly kmsClient: IKmsClient;
  private readonly resolver: KeyDescriptorResolver;
  private readonly engine: SigningEngine;
  private readonly config: KmsSignerConfig;
  private readonly retryPolicy: RetryPolicy;
  private descriptor: KeyDescriptor | null = null;
  private pending: PendingResolution | null = null;

  constructor(kmsClient: IKmsClient, config: KmsSignerConfig) {
    this.kmsClient = kmsClient;
    this.keyReference = config.keyReference;
    this.config = config;

    const retryPolicy = createRetryPolicy(config.retryPolicy);
    this.retryPolicy = retryPolicy;
    const onRetry = (info: RetryInfo) => this.auditRetry(info);
    this.resolver = new KeyDescriptorResolver(kmsClient, { retryPolicy, onRetry, sleep: config.sleep });
    this.engine = new SigningEngine(kmsClient, {
      digest: config.digest,
      rsaPadding: config.rsaPadding,
      ecdsaSignatureEncoding: config.ecdsaSignatureEncoding,
      retryPolicy,
      onRetry,
      sleep: config.sleep,
    });
  }

  /** Digest and RSA padding this signer signs with. */
  get signingScheme(): SigningScheme {
    return this.engine.signingScheme;
  }

  /**
   * Resolve the key descriptor once and share it.
   * Concurrent first callers await the same fetch; a successful one is kept
   * for the signer's lifetime, a failed one is forgotten so the next caller
   * starts over. A caller's signal cancels only that caller's wait, unless it
   * is the last one waiting: then the fetch itself, and any retry wait behind
   * it, is aborted.
   */
  publicKey(options: CallOptions = {}): Promise<KeyDescriptor> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(CancelledError.fromSignal(signal));
    }
    if (this.descriptor) return Promise.resolve(this.descriptor);

    const pending = this.pending ?? this.startResolution();
    pending.waiters++;
    if (signal) {
      const onAbort = () => this.releaseWaiter(pending);
      const detach = () => signal.removeEventListener('abort', onAbort);
      signal.addEventListener('abort', onAbort, { once: true });
      pending.promise.then(detach, detach);
    }
    return abortable(pending.promise, signal);
  }

  async keyId(options: CallOptions = {}): Promise<string> {
    const descriptor = await this.publicKey(options);
    return descriptor.derivedKeyId;
  }

  /**
   * Sign a message with the remote key. Fails closed: every failure is a
   * typed SignerError and no partial signature is ever returned.
   */
  async sign(message: Uint8Array, options: CallOptions = {}): Promise<Signature> {
    try {
      const descriptor = await this.publicKey(options);
      const signature = await this.engine.sign(descriptor, message, options);
      this.audit('sign', 'success', `Signed ${message.length}-byte message`, {
        keyId: signature.keyId,
        algorithm: signature.algorithm,
      });
      return signature;
    } catch (error) {
      this.auditFailure('sign', 'Sign failed', error);
      throw error;
    }
  }

  /**
   * Health check: KeySpec, KeyUsage and KeyState via DescribeKey, then the derived
   * key id against expectedKeyId when configured.
   */
  async healthCheck(options: CallOptions = {}): Promise<void> {
    try {
      const metadata = await withRetry(
        () => this.kmsClient.describeKey(this.keyReference.resourceId, options.signal),
        {
          operation: 'DescribeKey',
          keyReference: this.keyReference.uri,
          policy: this.retryPolicy,
          signal: options.signal,
          onRetry: (info) => this.auditRetry(info),
          sleep: this.config.sleep,
        },
      );

      if (!SUPPORTED_KEY_SPECS.includes(metadata.keySpec)) {
        throw new HealthCheckError(
          `KMS key has unsupported KeySpec: ${metadata.keySpec}`,
        );
      }
      if (metadata.keyUsage !== 'SIGN_VERIFY') {
        throw new HealthCheckError(
          `KMS key has invalid KeyUsage: ${metadata.keyUsage}, expected SIGN_VERIFY`,
        );
      }
      if (metadata.keyState !== 'Enabled') {
        throw new HealthCheckError(`KMS key is not enabled: ${metadata.keyState}`);
      }

      if (this.config.expectedKeyId) {
        const derived = await this.keyId(options);
        if (derived !== this.config.expectedKeyId.toLowerCase()) {
          throw new HealthCheckError(
            `Derived key id ${derived} does not match expected ${this.config.expectedKeyId}`,
          );
        }
      }
      this.audit('health_check', 'success', 'Key is healthy');
    } catch (error) {
      this.auditFailure('health_check', 'Health check failed', error);
      throw error;
    }
  }

  private startResolution(): PendingResolution {
    const controller = new AbortController();
    const pending: PendingResolution = {
      promise: this.resolveDescriptor(controller.signal),
      controller,
      waiters: 0,
    };
    this.pending = pending;
    pending.promise.then(
      (descriptor) => {
        if (this.pending === pending) {
          this.descriptor = descriptor;
          this.pending = null;
        }
      },
      () => {
        if (this.pending === pending) this.pending = null;
      },
    );
    return pending;
  }

  private releaseWaiter(pending: PendingResolution): void {
    pending.waiters--;
    if (pending.waiters > 0) return;
    if (this.pending === pending) this.pending = null;
    pending.controller.abort();
  }

  private async resolveDescriptor(signal: AbortSignal): Promise<KeyDescriptor> {
    try {
      const descriptor = await this.resolver.resolve(this.keyReference, { signal });
      this.audit('get_public_key', 'success', 'Resolved public key', {
        keyId: descriptor.derivedKeyId,
        family: descriptor.algorithmFamily,
        keySize: descriptor.keySize,
        curve: descriptor.curve,
      });
      return descriptor;
    } catch (error) {
      this.auditFailure('get_public_key', 'Public key resolution failed', error);
      throw error;
    }
  }

  private auditRetry(info: RetryInfo): void {
    this.audit('retry', 'error', `Retrying ${info.operation} after transient failure`, {
      attempt: info.attempt,
      delayMs: info.delayMs,
      serviceCode: info.error.serviceCode,
    });
  }

  private auditFailure(
    action: Exclude<AuditAction, 'retry'>,
    what: string,
    error: unknown,
  ): void {
    this.audit(action, 'error', what, {
      code: error instanceof SignerError ? error.code : 'UNKNOWN',
      error: error instanceof Error ? error.message : String(error),
    });
  }

  private audit(
    action: AuditAction,
    result: 'success' | 'error',
    what: string,
    details: Record<string, unknown> = {},
  ): void {
    this.config.auditSink?.log({
      service: SERVICE,
      action,
      who: this.config.caller ?? 'host',
      what,
      result,
      details: { keyReference: this.keyReference.uri, ...details },
    });
  }
}
