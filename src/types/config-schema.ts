/**
 * Runtime JSON Schema for `relay.toml` using ajv.
 *
 * Kept as a plain object (not a TypeScript type) so it can be fed
 * directly to `new Ajv().compile(RELAY_CONFIG_SCHEMA)`. Structural rules
 * live here; cross-field rules (script xor code, unique stage names)
 * live in `parseConfig()`.
 */

const positiveInteger = { type: 'integer', minimum: 1 } as const;

export const RELAY_CONFIG_SCHEMA = {
  $id: 'https://scriptrelay.local/schemas/relay-config.json',
  type: 'object' as const,
  additionalProperties: false,

  $defs: {
    stage: {
      type: 'object' as const,
      required: ['name'] as string[],
      additionalProperties: false,
      properties: {
        name: { type: 'string', minLength: 1, pattern: '^[A-Za-z0-9][A-Za-z0-9_.-]*$' },
        label: { type: 'string' },
        script: { type: 'string', minLength: 1 },
        code: { type: 'string', minLength: 1 },
        send_as: { type: 'string', enum: ['code', 'path'] },
        attempts: positiveInteger,
        timeout_ms: positiveInteger,
        retry_on_application_error: { type: 'boolean' },
        enabled: { type: 'boolean' },
      },
    },
  },

  properties: {
    host: {
      type: 'object',
      additionalProperties: false,
      properties: {
        address: { type: 'string', minLength: 1 },
        port: { type: 'integer', minimum: 1, maximum: 65535 },
        connect_timeout_ms: positiveInteger,
        max_response_bytes: positiveInteger,
      },
    },
    retry: {
      type: 'object',
      additionalProperties: false,
      properties: {
        max_attempts: positiveInteger,
        base_timeout_ms: positiveInteger,
        max_timeout_ms: positiveInteger,
        timeout_multiplier: { type: 'number', exclusiveMinimum: 1 },
        initial_backoff_ms: positiveInteger,
        max_backoff_ms: positiveInteger,
        debug: { type: 'boolean' },
      },
    },
    logging: {
      type: 'object',
      additionalProperties: false,
      properties: {
        level: { type: 'string', enum: ['debug', 'info', 'warn', 'error'] },
      },
    },
    journal: {
      type: 'object',
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        path: { type: 'string', minLength: 1 },
      },
    },
    pipeline: {
      type: 'object',
      additionalProperties: false,
      properties: {
        name: { type: 'string', minLength: 1 },
      },
    },
    stages: {
      type: 'array',
      items: { $ref: '#/$defs/stage' },
    },
  },
} as const;
