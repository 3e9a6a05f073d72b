import { resolveCredential } from '../../core/resolver';
import { renderCreateSecretSql } from '../../providers/sinks';
import {
  buildDecryptor,
  buildRequest,
  failWith,
  loadCliConfig,
  type ConnectionArgs,
  type ResolveOptions,
} from './shared';

/**
 * Print the CREATE OR REPLACE SECRET statement for a credential, for piping
 * straight into a SQL shell:
 *
 *   duck-rage sql postgres localhost 5432 mydb myuser appuser | duckdb app.db
 *
 * This is the only command whose output contains the password.
 */
export async function sqlCommand(
  args: ConnectionArgs,
  options: ResolveOptions = {}
): Promise<void> {
  try {
    const config = loadCliConfig(options);
    const request = buildRequest(args, options, config);
    const record = await resolveCredential(request, {
      decryptor: buildDecryptor(options, config),
    });

    process.stdout.write(`${renderCreateSecretSql(record)};\n`);
  } catch (error) {
    failWith(error, options.json);
  }
}
