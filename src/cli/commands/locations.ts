import { LocationError } from '../../core/errors';
import { assertReadable, planLocations, type ResolvedLocation } from '../../core/locations';
import { failWith, loadCliConfig } from './shared';
import { getProfile, type ProfileConfig } from '../config-yaml';

export interface LocationsOptions {
  secretsFile?: string;
  identityFile?: string;
  profile?: string;
  config?: string;
  json?: boolean;
}

interface LocationStatus extends ResolvedLocation {
  readable: boolean;
  error?: string;
}

function inspectLocation(location: ResolvedLocation, label: string): LocationStatus {
  try {
    assertReadable(location, label);
    return { ...location, readable: true };
  } catch (error) {
    if (!(error instanceof LocationError)) {
      throw error;
    }
    return { ...location, readable: false, error: error.message };
  }
}

function printLocations(secretsFile: LocationStatus, identityFile: LocationStatus): void {
  console.log('');
  for (const [label, status] of [['Secrets file', secretsFile], ['Identity file', identityFile]] as const) {
    const mark = status.readable ? '✅' : '❌';
    console.log(`${mark} ${label}: ${status.path}`);
    console.log(`    Source: ${status.source}`);
    if (status.error) {
      console.log(`    ${status.error}`);
    }
  }
  console.log('');
}

/**
 * Show which secrets and identity files a resolution would use and why.
 * Nothing is decrypted.
 */
export async function locationsCommand(options: LocationsOptions = {}): Promise<void> {
  let allReadable = false;
  try {
    const config = loadCliConfig(options);
    const profile: ProfileConfig = options.profile ? getProfile(config, options.profile) : {};
    const planned = planLocations(
      {
        secretsFile: options.secretsFile ?? profile.secretsFile,
        identityFile: options.identityFile ?? profile.identityFile,
      },
      process.env
    );

    const secretsFile = inspectLocation(planned.secretsFile, 'secrets file');
    const identityFile = inspectLocation(planned.identityFile, 'identity file');

    if (options.json) {
      console.log(JSON.stringify({ secretsFile, identityFile }, null, 2));
    } else {
      printLocations(secretsFile, identityFile);
    }

    allReadable = secretsFile.readable && identityFile.readable;
  } catch (error) {
    failWith(error, options.json);
  }

  if (!allReadable) {
    process.exit(1);
  }
}
