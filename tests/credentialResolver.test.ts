import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { usageProfile } from '@/config/usageProfile';
import { parseCredentialPayload } from '@/services/credentials/credentialPayload';
import {
  CredentialsNotFoundError,
  defaultCredentialSources,
  describeMissingCredentials,
  resolveCredentials,
} from '@/services/credentials/credentialResolver';
import { createFileCredentialSource } from '@/services/credentials/fileCredentialSource';
import { createMacKeychainSource, createWindowsCredentialSource } from '@/services/credentials/secretStoreSources';
import type { CommandRunner, CredentialSource } from '@/services/credentials/types';

const credentialDocument = (accessToken: string, refreshToken?: string) =>
  JSON.stringify({ claudeAiOauth: { accessToken, refreshToken, expiresAt: 1_900_000_000_000 } });

describe('parseCredentialPayload', () => {
  it('reads the nested OAuth tokens', () => {
    expect(parseCredentialPayload(credentialDocument('test-access', 'test-refresh'), 'somewhere')).toEqual({
      accessToken: 'test-access',
      refreshToken: 'test-refresh',
      sourceLocation: 'somewhere',
    });
  });

  it('treats a missing refresh token as null', () => {
    expect(parseCredentialPayload(credentialDocument('test-access'), 'x')?.refreshToken).toBeNull();
  });

  it('rejects documents without a usable access token', () => {
    expect(parseCredentialPayload('not json', 'x')).toBeNull();
    expect(parseCredentialPayload('[]', 'x')).toBeNull();
    expect(parseCredentialPayload(JSON.stringify({ claudeAiOauth: { accessToken: '' } }), 'x')).toBeNull();
    expect(parseCredentialPayload(JSON.stringify({ accessToken: 'test-access' }), 'x')).toBeNull();
  });
});

describe('resolveCredentials', () => {
  let home: string;

  beforeEach(async () => {
    home = await mkdtemp(path.join(tmpdir(), 'galvo-creds-'));
    await mkdir(path.join(home, '.claude'));
  });

  afterEach(async () => {
    await rm(home, { recursive: true, force: true });
  });

  it('prefers the primary credentials file', async () => {
    const primary = path.join(home, '.claude', '.credentials.json');
    const alternate = path.join(home, '.claude', 'credentials.json');
    await writeFile(primary, credentialDocument('primary-token'));
    await writeFile(alternate, credentialDocument('alternate-token'));

    const credentials = await resolveCredentials([
      createFileCredentialSource(primary),
      createFileCredentialSource(alternate),
    ]);

    expect(credentials).toEqual({ accessToken: 'primary-token', refreshToken: null, sourceLocation: primary });
  });

  it('falls through unusable candidates in order', async () => {
    const primary = path.join(home, '.claude', '.credentials.json');
    const alternate = path.join(home, '.claude', 'credentials.json');
    await writeFile(primary, '{"claudeAiOauth": {}}');
    await writeFile(alternate, credentialDocument('alternate-token', 'test-refresh'));

    const credentials = await resolveCredentials(defaultCredentialSources(usageProfile, home));

    expect(credentials.accessToken).toBe('alternate-token');
    expect(credentials.refreshToken).toBe('test-refresh');
    expect(credentials.sourceLocation).toBe(alternate);
  });

  it('skips sources that are not available on this platform', async () => {
    const tryLoad = vi.fn();
    const gated: CredentialSource = { location: 'elsewhere', isAvailable: () => false, tryLoad };
    const file = path.join(home, '.claude', '.credentials.json');
    await writeFile(file, credentialDocument('file-token'));

    await resolveCredentials([gated, createFileCredentialSource(file)]);

    expect(tryLoad).not.toHaveBeenCalled();
  });

  it('lists every checked location when nothing is usable', async () => {
    const primary = path.join(home, '.claude', '.credentials.json');
    const alternate = path.join(home, '.claude', 'credentials.json');
    const keychainRun: CommandRunner = () => ({ status: 44, stdout: '', stderr: 'item could not be found' });

    const sources = [
      createFileCredentialSource(primary),
      createFileCredentialSource(alternate),
      createMacKeychainSource({ platform: 'darwin', run: keychainRun }),
      createWindowsCredentialSource({ platform: 'darwin' }),
    ];

    const error = await resolveCredentials(sources).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CredentialsNotFoundError);
    if (!(error instanceof CredentialsNotFoundError)) {
      return;
    }
    expect(error.checkedLocations).toEqual([primary, alternate, 'macOS Keychain ("Claude Code-credentials")']);
    expect(describeMissingCredentials(error)).toEqual([
      'Could not find Claude Code credentials.',
      'Checked:',
      `  - ${primary}`,
      `  - ${alternate}`,
      '  - macOS Keychain ("Claude Code-credentials")',
      '',
      "Make sure you've logged into Claude Code at least once.",
    ]);
  });
});

describe('secret store sources', () => {
  it('queries the macOS Keychain by entry name', async () => {
    const run = vi.fn<Parameters<CommandRunner>, ReturnType<CommandRunner>>(() => ({
      status: 0,
      stdout: `${credentialDocument('keychain-token', 'keychain-refresh')}\n`,
      stderr: '',
    }));
    const source = createMacKeychainSource({ platform: 'darwin', run });

    await expect(source.tryLoad()).resolves.toEqual({
      accessToken: 'keychain-token',
      refreshToken: 'keychain-refresh',
      sourceLocation: 'macOS Keychain ("Claude Code-credentials")',
    });
    expect(run).toHaveBeenCalledWith('security', ['find-generic-password', '-s', 'Claude Code-credentials', '-w']);
  });

  it('is only available on its own platform', () => {
    expect(createMacKeychainSource({ platform: 'linux' }).isAvailable()).toBe(false);
    expect(createWindowsCredentialSource({ platform: 'win32' }).isAvailable()).toBe(true);
    expect(createWindowsCredentialSource({ platform: 'linux' }).isAvailable()).toBe(false);
  });

  it('reads the Windows vault through PowerShell', async () => {
    const run = vi.fn<Parameters<CommandRunner>, ReturnType<CommandRunner>>(() => ({
      status: 0,
      stdout: credentialDocument('vault-token'),
      stderr: '',
    }));
    const source = createWindowsCredentialSource({ platform: 'win32', run });

    const credentials = await source.tryLoad();

    expect(credentials?.accessToken).toBe('vault-token');
    expect(run.mock.calls[0][0]).toBe('powershell');
    expect(run.mock.calls[0][1].slice(0, 3)).toEqual(['-NoProfile', '-NonInteractive', '-Command']);
    expect(run.mock.calls[0][1][3]).toContain('$v.Retrieve("Claude Code-credentials", "credentials")');
  });

  it('treats a missing binary as no credentials', async () => {
    const run: CommandRunner = () => ({ status: null, stdout: '', stderr: '', error: new Error('spawn security ENOENT') });

    await expect(createMacKeychainSource({ platform: 'darwin', run }).tryLoad()).resolves.toBeNull();
  });
});
