import type { CliContext } from '../context.js';
import { type OutputFormat, toJson, toHuman } from '../formatters.js';

export async function runHealth(ctx: CliContext, format: OutputFormat = 'json'): Promise<void> {
  try {
    await ctx.signer.healthCheck();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(toJson({ status: 'unhealthy', error: message }) + '\n');
    process.exitCode = 1;
    return;
  }

  if (format === 'json') {
    process.stdout.write(toJson({ status: 'healthy' }) + '\n');
  } else if (format === 'human') {
    process.stdout.write(toHuman({ status: 'healthy' }, 'Health Check') + '\n');
  } else {
    process.stdout.write('healthy\n');
  }
}
