/**
 * Redaction paths for pino. The OpenAI key travels through config objects,
 * so config and error payloads are covered as well as top-level fields.
 */
export const REDACTION_CONFIG: { readonly paths: string[]; readonly censor: string } = {
  paths: [
    'apiKey',
    'token',
    'secret',
    'password',
    'authorization',

    '*.apiKey',
    '*.token',
    '*.secret',

    'config.generation.apiKey',
    'generation.apiKey',

    'headers.authorization',
    'headers.Authorization',
    'headers["x-api-key"]',

    'err.config.generation.apiKey',
  ],
  censor: '[REDACTED]',
};
