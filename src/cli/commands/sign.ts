import type { CliContext } from '../context.js';
import { parseOutputFormat, readInput, toJson, toHuman } from '../formatters.js';

export async function runSign(ctx: CliContext, argv: string[]): Promise<void> {
  let input = '';
  let timeoutMs: number | undefined;
  const format = parseOutputFormat(argv);

  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case '--input': input = argv[++i]; break;
      case '--timeout-ms': timeoutMs = Number(argv[++i]); break;
    }
  }

  if (!input) {
    throw new Error('Usage: kms-key-source sign --key <uri> --input <file|-> [--timeout-ms <ms>]');
  }
  if (timeoutMs !== undefined && (!Number.isInteger(timeoutMs) || timeoutMs <= 0)) {
    throw new Error('--timeout-ms must be a positive integer');
  }

  const message = await readInput(input);
  const signal = timeoutMs ? AbortSignal.timeout(timeoutMs) : undefined;
  const signature = await ctx.signer.sign(message, { signal });
  const encoded = Buffer.from(signature.bytes).toString('base64');

  const result = {
    keyId: signature.keyId,
    algorithm: signature.algorithm,
    encoding: signature.encoding,
    signature: encoded,
  };

  if (format === 'json') {
    process.stdout.write(toJson(result) + '\n');
  } else if (format === 'human') {
    process.stdout.write(toHuman(result, 'Signature') + '\n');
  } else {
    process.stdout.write(encoded + '\n');
  }
}
