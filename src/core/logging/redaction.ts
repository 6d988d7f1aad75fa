/**
 * Redaction configuration for pino.
 *
 * The target's environment travels with every launch plan and routinely holds
 * broker URLs and API keys, so it is never written out.
 */
export const REDACTION_CONFIG = {
  paths: [
    // Child environment, wherever it is attached
    'env',
    '*.env',

    // Top-level sensitive fields
    'token',
    'secret',
    'password',
    'apiKey',
    'authorization',

    // One level nested (*.field)
    '*.token',
    '*.secret',
    '*.password',
    '*.apiKey',
  ] as string[],  // Cast to mutable for pino compatibility
  censor: '[REDACTED]',
};
