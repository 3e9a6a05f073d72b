import type { HealthCheckResult } from '../../providers/types';
import { buildDecryptor, failWith, loadCliConfig } from './shared';

export interface CheckOptions {
  decryptor?: string;
  config?: string;
  json?: boolean;
}

/**
 * Check that the configured decryptor can be run.
 */
export async function checkCommand(options: CheckOptions = {}): Promise<void> {
  let healthy = false;
  try {
    const config = loadCliConfig(options);
    const decryptor = buildDecryptor(options, config);

    const result: HealthCheckResult = decryptor.healthCheck
      ? await decryptor.healthCheck()
      : { healthy: true };

    if (options.json) {
      console.log(JSON.stringify({ decryptor: decryptor.name, ...result }, null, 2));
    } else if (result.healthy) {
      const version = result.version ? ` (${result.version})` : '';
      console.log(`✅ ${decryptor.name} is available${version}`);
    } else {
      console.log(`❌ ${decryptor.name} is not available: ${result.error}`);
    }
    healthy = result.healthy;
  } catch (error) {
    failWith(error, options.json);
  }

  if (!healthy) {
    process.exit(1);
  }
}
