#!/usr/bin/env node

import { parseGlobalArgs, buildCliContext } from './context.js';
import { parseOutputFormat } from './formatters.js';
import { runPublicKey } from './commands/public-key.js';
import { runSign } from './commands/sign.js';
import { runHealth } from './commands/health.js';

const USAGE = `Usage: kms-key-source <command> [options]

Commands:
  public-key      Resolve the key and print its id, PEM and metadata key object
  sign            Sign a file (or stdin) with the remote key
  health          Check that the key is enabled and usable for signing

Global options:
  --key <uri>               Key reference, e.g. kms://alias/root-key (or set SIGNER_KEY_URI)
  --region <region>         Default AWS region (or set SIGNER_REGION)
  --digest <alg>            sha256 (default), sha384, sha512
  --rsa-padding <p>         pss (default), pkcs1-v1_5
  --ecdsa-encoding <e>      der (default), ieee-p1363
  --expected-key-id <hex>   Expected derived key id (health check)
  --output <format>         Output format: json (default), human, raw
  --help, -h                Show this help message

Sign options:
  --input <file|->          Bytes to sign; '-' reads stdin
  --timeout-ms <ms>         Abort the operation after this deadline
`;

function usage(exitCode = 1): never {
  const stream = exitCode === 0 ? process.stdout : process.stderr;
  stream.write(USAGE);
  process.exit(exitCode);
}

async function main(): Promise<void> {
  const subcommand = process.argv[2];
  const rest = process.argv.slice(3);

  if (subcommand === '--help' || subcommand === '-h') {
    usage(0);
  }

  if (!subcommand) {
    usage(1);
  }

  if (rest.includes('--help') || rest.includes('-h')) {
    usage(0);
  }

  switch (subcommand) {
    case 'public-key': {
      const ctx = buildCliContext(parseGlobalArgs(rest));
      await runPublicKey(ctx, parseOutputFormat(rest));
      break;
    }
    case 'sign': {
      const ctx = buildCliContext(parseGlobalArgs(rest));
      await runSign(ctx, rest);
      break;
    }
    case 'health': {
      const ctx = buildCliContext(parseGlobalArgs(rest));
      await runHealth(ctx, parseOutputFormat(rest));
      break;
    }
    default:
      usage();
  }
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Error: ${message}\n`);
  process.exit(1);
});
