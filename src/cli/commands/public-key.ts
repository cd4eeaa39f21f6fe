import { derToPem } from '../../key-util.js';
import { toMetadataKey } from '../../metadata-key.js';
import type { CliContext } from '../context.js';
import { type OutputFormat, toJson, toHuman } from '../formatters.js';

export async function runPublicKey(ctx: CliContext, format: OutputFormat = 'json'): Promise<void> {
  const descriptor = await ctx.signer.publicKey();
  const pem = derToPem(descriptor.publicKeyDer);

  const summary = {
    keyReference: descriptor.keyReference.uri,
    keyId: descriptor.derivedKeyId,
    family: descriptor.algorithmFamily,
    keySize: descriptor.keySize,
    curve: descriptor.curve,
    signingAlgorithms: descriptor.signingAlgorithms,
  };

  switch (format) {
    case 'json':
      process.stdout.write(
        toJson({ ...summary, publicKeyPem: pem, key: toMetadataKey(descriptor, ctx.signer.signingScheme) }) + '\n',
      );
      break;
    case 'human':
      process.stdout.write(toHuman(summary, 'Public Key') + '\n' + pem);
      break;
    default:
      process.stdout.write(pem);
  }
}
