import { setTimeout as delay } from 'node:timers/promises';
import { z } from 'zod';
import { classifyKmsError } from './kms-client.js';
import {
  CancelledError,
  RemoteServiceError,
  SignerError,
  type ServiceOperation,
} from './errors.js';

export const retryPolicySchema = z
  .object({
    maxAttempts: z.number().int().min(1).max(20).default(5),
    initialDelayMs: z.number().int().min(0).default(100),
    maxDelayMs: z.number().int().min(0).default(2_000),
    backoffFactor: z.number().min(1).default(2),
    maxElapsedMs: z.number().int().min(0).default(20_000),
  })
  .refine((p) => p.maxDelayMs >= p.initialDelayMs, {
    message: 'maxDelayMs must be >= initialDelayMs',
    path: ['maxDelayMs'],
  });

export type RetryPolicy = z.infer<typeof retryPolicySchema>;
export type RetryPolicyInput = z.input<typeof retryPolicySchema>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = retryPolicySchema.parse({});

export function createRetryPolicy(input: RetryPolicyInput = {}): RetryPolicy {
  return retryPolicySchema.parse(input);
}

/**
 * Equal-jitter exponential backoff for the wait that follows `attempt`
 * (1-based). Pure: the jitter source is injected.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const exponential = policy.initialDelayMs * policy.backoffFactor ** (attempt - 1);
  const base = Math.min(policy.maxDelayMs, exponential);
  return Math.floor(base / 2 + random() * (base / 2));
}

export interface RetryInfo {
  operation: ServiceOperation;
  keyReference: string;
  attempt: number;
  delayMs: number;
  error: RemoteServiceError;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryContext {
  operation: ServiceOperation;
  keyReference: string;
  policy?: RetryPolicy;
  signal?: AbortSignal;
  onRetry?: (info: RetryInfo) => void;
  sleep?: Sleep;
  random?: () => number;
  now?: () => number;
}

export const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) throw CancelledError.fromSignal(signal);
    throw error;
  }
};

/**
 * Settle with the operation's outcome, or reject with CancelledError as soon
 * as the signal fires, whichever comes first.
 */
export function abortable<T>(operation: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return operation;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(CancelledError.fromSignal(signal));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    operation.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Run a service call under the retry policy. Only transient
 * RemoteServiceErrors are retried; every other failure surfaces on the first
 * attempt. Cancellation is observed before each attempt, during the call and
 * during the backoff wait.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  context: RetryContext,
): Promise<T> {
  const policy = context.policy ?? DEFAULT_RETRY_POLICY;
  const sleep = context.sleep ?? abortableSleep;
  const now = context.now ?? Date.now;
  const { signal } = context;
  const startedAt = now();

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) throw CancelledError.fromSignal(signal);

    let failure: RemoteServiceError;
    try {
      return await abortable(operation(attempt), signal);
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      if (signal?.aborted) throw CancelledError.fromSignal(signal);
      if (error instanceof SignerError && !(error instanceof RemoteServiceError)) throw error;
      failure = classifyKmsError(error, context.operation, context.keyReference);
    }

    if (!failure.transient) throw failure.withAttempts(attempt);
    if (attempt >= policy.maxAttempts) throw failure.withAttempts(attempt, true);

    const delayMs = computeBackoffDelay(attempt, policy, context.random);
    if (now() - startedAt + delayMs > policy.maxElapsedMs) {
      throw failure.withAttempts(attempt, true);
    }

    context.onRetry?.({
      operation: context.operation,
      keyReference: context.keyReference,
      attempt,
      delayMs,
      error: failure,
    });
    await sleep(delayMs, signal);
  }
}
