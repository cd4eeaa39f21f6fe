import { z } from 'zod';
import { AuditLogger } from '../audit/index.js';
import { KmsSigner } from '../kms-signer.js';
import { createDefaultRegistry } from '../registry.js';
import type { AwsKmsClientConfig, IKmsClient } from '../kms-client.js';

const cliArgsSchema = z.object({
  key: z.string().min(1, '--key is required (or set SIGNER_KEY_URI)'),
  region: z.string().min(1).optional(),
  digest: z.enum(['sha256', 'sha384', 'sha512']).default('sha256'),
  rsaPadding: z.enum(['pss', 'pkcs1-v1_5']).default('pss'),
  ecdsaEncoding: z.enum(['der', 'ieee-p1363']).default('der'),
  expectedKeyId: z.string().regex(/^[0-9a-fA-F]{64}$/, 'expected key id must be 64 hex chars').optional(),
});

export type CliGlobalArgs = z.infer<typeof cliArgsSchema>;

export function parseGlobalArgs(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): CliGlobalArgs {
  const raw: Record<string, string | undefined> = {
    key: env.SIGNER_KEY_URI,
    region: env.SIGNER_REGION,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--key':
        raw.key = argv[++i];
        break;
      case '--region':
        raw.region = argv[++i];
        break;
      case '--digest':
        raw.digest = argv[++i];
        break;
      case '--rsa-padding':
        raw.rsaPadding = argv[++i];
        break;
      case '--ecdsa-encoding':
        raw.ecdsaEncoding = argv[++i];
        break;
      case '--expected-key-id':
        raw.expectedKeyId = argv[++i];
        break;
      default:
        break;
    }
  }

  const parsed = cliArgsSchema.safeParse({ ...raw, key: raw.key ?? '' });
  if (!parsed.success) {
    throw new Error(parsed.error.issues.map((i) => i.message).join('; '));
  }
  return parsed.data;
}

export interface CliContext {
  signer: KmsSigner;
}

export interface CliContextOptions {
  createClient?: (config: AwsKmsClientConfig) => IKmsClient;
  auditOutput?: NodeJS.WritableStream;
}

export function buildCliContext(args: CliGlobalArgs, options: CliContextOptions = {}): CliContext {
  const registry = createDefaultRegistry({
    region: args.region,
    createClient: options.createClient,
    signer: {
      digest: args.digest,
      rsaPadding: args.rsaPadding,
      ecdsaSignatureEncoding: args.ecdsaEncoding,
      expectedKeyId: args.expectedKeyId,
      auditSink: new AuditLogger({ output: options.auditOutput }),
      caller: 'cli',
    },
  });

  const signer = registry.register(args.key);
  if (!(signer instanceof KmsSigner)) {
    throw new Error(`Key ${args.key} is not backed by KMS`);
  }
  return { signer };
}
