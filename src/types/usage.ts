export interface Credentials {
  accessToken: string;
  refreshToken: string | null;
  /** Where the credentials were found; diagnostics only. */
  sourceLocation: string;
}

export interface TokenState {
  accessToken: string;
  refreshToken: string | null;
}

export interface RefreshedToken {
  accessToken: string;
  /** Present when the token endpoint rotated the refresh token. */
  refreshToken: string | null;
}

export interface UsageSnapshot {
  utilizationPercent: number | null;
  resetsAt: Date | null;
}

export interface UsageFetchResult {
  snapshot: UsageSnapshot | null;
  authExpired: boolean;
}
