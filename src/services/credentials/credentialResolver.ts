import { homedir } from 'node:os';
import * as path from 'node:path';

import { type UsageProfile, usageProfile } from '@/config/usageProfile';
import type { Credentials } from '@/types/usage';
import { logger } from '@/utils/logger';

import { createFileCredentialSource } from './fileCredentialSource';
import { createMacKeychainSource, createWindowsCredentialSource } from './secretStoreSources';
import type { CredentialSource } from './types';

export class CredentialsNotFoundError extends Error {
  constructor(readonly checkedLocations: string[]) {
    super('Could not find Claude Code credentials.');
    this.name = 'CredentialsNotFoundError';
  }
}

/**
 * Lookup order: the two credential files under the home directory, then the
 * macOS Keychain, then the Windows credential vault.
 */
export const defaultCredentialSources = (
  profile: UsageProfile = usageProfile,
  homeDir: string = homedir(),
): CredentialSource[] => [
  ...profile.credentialFiles.map((relative) => createFileCredentialSource(path.join(homeDir, relative))),
  createMacKeychainSource({ entryName: profile.secretStoreEntry }),
  createWindowsCredentialSource({ entryName: profile.secretStoreEntry }),
];

export const resolveCredentials = async (sources: CredentialSource[]): Promise<Credentials> => {
  const checked: string[] = [];

  for (const source of sources) {
    if (!source.isAvailable()) {
      continue;
    }
    checked.push(source.location);

    const credentials = await source.tryLoad();
    if (credentials) {
      logger.auth(`using credentials from ${credentials.sourceLocation}`);
      return credentials;
    }
  }

  throw new CredentialsNotFoundError(checked);
};

export const describeMissingCredentials = (error: CredentialsNotFoundError): string[] => [
  error.message,
  'Checked:',
  ...error.checkedLocations.map((location) => `  - ${location}`),
  '',
  "Make sure you've logged into Claude Code at least once.",
];
