import { spawnSync } from 'node:child_process';

import { usageProfile } from '@/config/usageProfile';
import { logger } from '@/utils/logger';

import { parseCredentialPayload } from './credentialPayload';
import type { CommandRunner, CredentialSource } from './types';

export const spawnCommand: CommandRunner = (command, args) => {
  const run = spawnSync(command, args, { encoding: 'utf8' });
  return {
    status: run.status,
    stdout: String(run.stdout ?? ''),
    stderr: String(run.stderr ?? ''),
    error: run.error,
  };
};

interface SecretStoreOptions {
  entryName?: string;
  platform?: NodeJS.Platform;
  run?: CommandRunner;
}

const readSecret = (run: CommandRunner, label: string, command: string, args: string[]) => {
  const result = run(command, args);
  if (result.error) {
    logger.auth(`${label} unavailable: ${result.error.message}`);
    return null;
  }
  if (result.status !== 0) {
    logger.auth(`${label} lookup failed (${result.status ?? -1}): ${result.stderr.trim()}`);
    return null;
  }
  const secret = result.stdout.trim();
  return secret || null;
};

export const createMacKeychainSource = ({
  entryName = usageProfile.secretStoreEntry,
  platform = process.platform,
  run = spawnCommand,
}: SecretStoreOptions = {}): CredentialSource => {
  const location = `macOS Keychain ("${entryName}")`;

  return {
    location,
    isAvailable: () => platform === 'darwin',
    tryLoad: async () => {
      const secret = readSecret(run, location, 'security', ['find-generic-password', '-s', entryName, '-w']);
      return secret ? parseCredentialPayload(secret, location) : null;
    },
  };
};

const passwordVaultScript = (entryName: string) =>
  [
    '[Windows.Security.Credentials.PasswordVault,Windows.Security.Credentials,ContentType=WindowsRuntime] | Out-Null',
    '$v = New-Object Windows.Security.Credentials.PasswordVault',
    `$c = $v.Retrieve("${entryName}", "credentials")`,
    '$c.RetrievePassword()',
    '$c.Password',
  ].join('; ');

export const createWindowsCredentialSource = ({
  entryName = usageProfile.secretStoreEntry,
  platform = process.platform,
  run = spawnCommand,
}: SecretStoreOptions = {}): CredentialSource => {
  const location = `Windows Credential Manager ("${entryName}")`;

  return {
    location,
    isAvailable: () => platform === 'win32',
    tryLoad: async () => {
      const secret = readSecret(run, location, 'powershell', [
        '-NoProfile',
        '-NonInteractive',
        '-Command',
        passwordVaultScript(entryName),
      ]);
      return secret ? parseCredentialPayload(secret, location) : null;
    },
  };
};
