export interface UsageProfile {
  usageUrl: string;
  tokenUrl: string;
  clientId: string;
  userAgent: string;
  betaHeader: string;
  /** Key under which the OAuth block sits in the stored credentials document. */
  oauthKey: string;
  /** Entry name used by the macOS Keychain and the Windows credential vault. */
  secretStoreEntry: string;
  /** Credential files, relative to the home directory, in lookup order. */
  credentialFiles: readonly string[];
}

export const usageProfile: Readonly<UsageProfile> = Object.freeze({
  usageUrl: 'https://api.anthropic.com/api/oauth/usage',
  tokenUrl: 'https://console.anthropic.com/api/oauth/token',
  clientId: '9d1c250a-e61b-44d9-88ed-5944d1962f5e',
  userAgent: 'claude-code/2.1.1',
  betaHeader: 'oauth-2025-04-20',
  oauthKey: 'claudeAiOauth',
  secretStoreEntry: 'Claude Code-credentials',
  credentialFiles: Object.freeze(['.claude/.credentials.json', '.claude/credentials.json']),
});
