#!/usr/bin/env node

/**
 * duck-rage CLI
 * Database credentials from an age-encrypted secrets file
 */

import { Command } from 'commander';
import { resolveCommand } from './commands/resolve';
import { sqlCommand } from './commands/sql';
import { locationsCommand } from './commands/locations';
import { checkCommand } from './commands/check';
import { readFileSync } from 'fs';
import { join } from 'path';

// Read version from package.json
const packageJsonPath = join(__dirname, '../../package.json');
const packageJson: { version?: string } = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
const version = packageJson.version || '0.0.0';

const CONNECTION_ARGS = '[kind] [host] [port] [database] [user] [secretKey]';

const program = new Command();

program
  .name('duck-rage')
  .description('Database credentials from an age-encrypted secrets file')
  .version(version);

program
  .command(`resolve ${CONNECTION_ARGS}`)
  .description('Resolve a credential and show what would be registered (never prints the secret)')
  .option('-s, --secrets-file <path>', 'Encrypted secrets file (overrides RAGE_SECRETS_FILE)')
  .option('-i, --identity-file <path>', 'age identity file (overrides RAGE_IDENTITY_FILE)')
  .option('-p, --profile <name>', 'Connection profile from config.yaml')
  .option('-d, --decryptor <name>', 'Decryptor to use (rage|age)')
  .option('-c, --config <path>', 'Path to config.yaml')
  .option('--json', 'Output as JSON')
  .action((kind, host, port, database, user, secretKey, options) =>
    resolveCommand({ kind, host, port, database, user, secretKey }, options)
  );

program
  .command(`sql ${CONNECTION_ARGS}`)
  .description('Print a CREATE OR REPLACE SECRET statement for the credential')
  .option('-s, --secrets-file <path>', 'Encrypted secrets file (overrides RAGE_SECRETS_FILE)')
  .option('-i, --identity-file <path>', 'age identity file (overrides RAGE_IDENTITY_FILE)')
  .option('-p, --profile <name>', 'Connection profile from config.yaml')
  .option('-d, --decryptor <name>', 'Decryptor to use (rage|age)')
  .option('-c, --config <path>', 'Path to config.yaml')
  .option('--json', 'Report errors as JSON')
  .action((kind, host, port, database, user, secretKey, options) =>
    sqlCommand({ kind, host, port, database, user, secretKey }, options)
  );

program
  .command('locations')
  .description('Show which secrets and identity files would be used')
  .option('-s, --secrets-file <path>', 'Encrypted secrets file')
  .option('-i, --identity-file <path>', 'age identity file')
  .option('-p, --profile <name>', 'Connection profile from config.yaml')
  .option('-c, --config <path>', 'Path to config.yaml')
  .option('--json', 'Output as JSON')
  .action(locationsCommand);

program
  .command('check')
  .description('Check that the decryptor binary is available')
  .option('-d, --decryptor <name>', 'Decryptor to check (rage|age)')
  .option('-c, --config <path>', 'Path to config.yaml')
  .option('--json', 'Output as JSON')
  .action(checkCommand);

program.parseAsync().catch((error: unknown) => {
  console.error('❌ Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
