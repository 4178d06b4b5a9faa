// Declaration file JSON schema (draft 2020-12).
export const ACCESS_DECLARATIONS_SCHEMA_2020_12 = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  properties: {
    $schema: { type: 'string' },
  },
  propertyNames: {
    anyOf: [{ const: '$schema' }, { type: 'string', pattern: '^[a-zA-Z_][a-zA-Z0-9_/-]*$' }],
  },
  additionalProperties: {
    type: 'array',
    items: {
      type: 'object',
      required: ['actions'],
      additionalProperties: false,
      properties: {
        actions: { type: 'array', minItems: 1, items: { type: 'string', minLength: 1 } },
        require: { type: 'string', minLength: 1 },
        context: { type: 'string', minLength: 1 },
        attributeCheck: { type: 'boolean' },
        model: { type: 'string', minLength: 1 },
        loadMethod: { type: 'string', minLength: 1 },
      },
    },
  },
};
