/**
 * Paths pino censors before a line is written.
 *
 * Handler params are logged at debug level; a CAD document's cloud session or
 * API credentials must not end up in a log file because a script passed them.
 */
export const REDACTION_CONFIG: { readonly paths: string[]; readonly censor: string } = {
  paths: [
    'token',
    'secret',
    'password',
    'apiKey',
    'authorization',

    '*.token',
    '*.secret',
    '*.password',
    '*.apiKey',

    'params.*.token',
    'params.*.password',
  ],
  censor: '[REDACTED]',
};
