import { promises as fs } from 'node:fs';

import { logger } from '@/utils/logger';

import { parseCredentialPayload } from './credentialPayload';
import type { CredentialSource } from './types';

const isMissingFile = (error: unknown) =>
  error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');

export const createFileCredentialSource = (filePath: string): CredentialSource => ({
  location: filePath,
  isAvailable: () => true,
  tryLoad: async () => {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        logger.warn(`Could not read ${filePath}`, error);
      }
      return null;
    }

    const credentials = parseCredentialPayload(raw, filePath);
    if (!credentials) {
      logger.auth(`${filePath} holds no usable access token`);
    }
    return credentials;
  },
});
