#!/usr/bin/env tsx
import { runCli } from '@/cli/main';
import { logger } from '@/utils/logger';

runCli(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error: unknown) => {
    logger.error('galvo failed', error);
    process.exit(1);
  },
);
