import { describeCredential, redactCredential } from '../../core/credential';
import { resolveCredential } from '../../core/resolver';
import {
  buildDecryptor,
  buildRequest,
  failWith,
  loadCliConfig,
  type ConnectionArgs,
  type ResolveOptions,
} from './shared';

/**
 * Resolve a credential and report what would be registered.
 * The secret value itself is never printed.
 */
export async function resolveCommand(
  args: ConnectionArgs,
  options: ResolveOptions = {}
): Promise<void> {
  try {
    const config = loadCliConfig(options);
    const request = buildRequest(args, options, config);
    const record = await resolveCredential(request, {
      decryptor: buildDecryptor(options, config),
    });

    if (options.json) {
      console.log(JSON.stringify(redactCredential(record), null, 2));
      return;
    }

    console.log(`✅ ${describeCredential(record)}`);
  } catch (error) {
    failWith(error, options.json);
  }
}
