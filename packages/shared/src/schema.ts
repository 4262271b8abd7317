import { HTTP_METHODS } from './types.js'

const constraintRuleSchema = {
  type: 'object',
  required: ['types'],
  properties: {
    types: {
      type: 'array',
      minItems: 1,
      items: { type: 'string', enum: ['string', 'number', 'boolean', 'array'] },
    },
    parameter: { type: 'string', enum: ['none', 'number', 'integer', 'string'] },
  },
  additionalProperties: false,
} as const

export const configSchema = {
  type: 'object',
  properties: {
    extensions: {
      type: 'array',
      minItems: 1,
      items: { type: 'string', pattern: '^\\.[A-Za-z0-9.]+$' },
    },
    output: { type: 'string', minLength: 1 },
    strict: { type: 'boolean' },
    constraints: {
      type: 'object',
      additionalProperties: constraintRuleSchema,
    },
  },
  additionalProperties: false,
} as const

const sectionSchema = {
  anyOf: [
    { type: 'null' },
    {
      type: 'object',
      required: ['array', 'fields'],
      properties: {
        reference: { type: 'string' },
        array: { type: 'boolean' },
        fields: { type: 'array', items: { $ref: '#/definitions/field' } },
      },
      additionalProperties: false,
    },
  ],
} as const

export const irDocumentSchema = {
  type: 'object',
  required: ['irVersion', 'entities', 'endpoints'],
  definitions: {
    field: {
      type: 'object',
      required: ['name', 'type', 'optional', 'array', 'constraints'],
      properties: {
        name: { type: 'string', minLength: 1 },
        type: { type: 'string', enum: ['string', 'number', 'boolean', 'object', 'reference'] },
        optional: { type: 'boolean' },
        array: { type: 'boolean' },
        constraints: {
          type: 'array',
          items: {
            type: 'object',
            required: ['name'],
            properties: {
              name: { type: 'string' },
              value: { type: ['string', 'number'] },
            },
            additionalProperties: false,
          },
        },
        enum: { type: 'array', items: { type: ['string', 'number', 'boolean'] } },
        reference: { type: 'string' },
        fields: { type: 'array', items: { $ref: '#/definitions/field' } },
      },
      additionalProperties: false,
    },
    section: sectionSchema,
  },
  properties: {
    irVersion: { const: '1.0' },
    entities: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['source', 'fields'],
        properties: {
          source: { type: 'string' },
          fields: { type: 'array', items: { $ref: '#/definitions/field' } },
        },
        additionalProperties: false,
      },
    },
    endpoints: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['source', 'method', 'path', 'pathParams', 'headers', 'params', 'query', 'body', 'responses'],
        properties: {
          source: { type: 'string' },
          method: { type: 'string', enum: [...HTTP_METHODS] },
          path: { type: 'string', pattern: '^/' },
          pathParams: { type: 'array', items: { type: 'string' } },
          headers: { $ref: '#/definitions/section' },
          params: { $ref: '#/definitions/section' },
          query: { $ref: '#/definitions/section' },
          body: { $ref: '#/definitions/section' },
          responses: {
            type: 'object',
            additionalProperties: {
              type: 'object',
              required: ['status', 'headers', 'body'],
              properties: {
                status: { type: 'integer', minimum: 100, maximum: 599 },
                headers: { $ref: '#/definitions/section' },
                body: { $ref: '#/definitions/section' },
              },
              additionalProperties: false,
            },
          },
        },
        additionalProperties: false,
      },
    },
  },
  additionalProperties: false,
} as const
