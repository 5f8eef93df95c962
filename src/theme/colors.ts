export const palette = {
  success: '\x1b[32m',
  warning: '\x1b[33m',
  danger: '\x1b[31m',
  reset: '\x1b[0m',
} as const;
