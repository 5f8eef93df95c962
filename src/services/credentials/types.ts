import type { Credentials } from '@/types/usage';

export interface CredentialSource {
  /** Human-readable location, reported when nothing usable is found. */
  readonly location: string;
  /** Platform gate; unavailable sources are neither queried nor reported. */
  isAvailable: () => boolean;
  tryLoad: () => Promise<Credentials | null>;
}

export interface CommandResult {
  status: number | null;
  stdout: string;
  stderr: string;
  error?: Error;
}

export type CommandRunner = (command: string, args: string[]) => CommandResult;
