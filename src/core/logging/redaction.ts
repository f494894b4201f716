/**
 * Redaction configuration for pino.
 * Never log secrets: passphrases for the config bundle in particular.
 */
export const REDACTION_CONFIG = {
  paths: [
    'passphrase',
    'token',
    'secret',
    'password',

    '*.passphrase',
    '*.token',
    '*.secret',
    '*.password',

    // Passphrase sources passed around as values
    'passphrase.value',
    '*.passphrase.value',
    'config.*.passphrase',
  ],
  censor: '[REDACTED]',
};
