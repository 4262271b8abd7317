import { describe, it, expect } from 'vitest'
import AjvModule from 'ajv'
import { configSchema, irDocumentSchema } from '../src/schema.js'

const Ajv = AjvModule.default
const ajv = new Ajv({ allErrors: true, allowUnionTypes: true })
const validateConfig = ajv.compile(configSchema)
const validateDocument = ajv.compile(irDocumentSchema)

describe('configSchema', () => {
  it('accepts an empty config', () => {
    expect(validateConfig({})).toBe(true)
  })

  it('accepts custom constraint rules', () => {
    expect(validateConfig({
      extensions: ['.spec', '.sml'],
      constraints: { currency: { types: ['string'], parameter: 'none' } },
    })).toBe(true)
  })

  it('rejects extensions without a leading dot', () => {
    expect(validateConfig({ extensions: ['spec'] })).toBe(false)
    expect(validateConfig.errors?.[0].instancePath).toBe('/extensions/0')
  })

  it('rejects rules that apply to nothing', () => {
    expect(validateConfig({ constraints: { currency: { types: [] } } })).toBe(false)
    expect(validateConfig.errors?.[0].instancePath).toBe('/constraints/currency/types')
  })
})

describe('irDocumentSchema', () => {
  it('accepts an empty document', () => {
    expect(validateDocument({ irVersion: '1.0', entities: {}, endpoints: {} })).toBe(true)
  })

  it('accepts nested object fields', () => {
    expect(validateDocument({
      irVersion: '1.0',
      entities: {
        Order: {
          source: 'order.spec',
          fields: [{
            name: 'meta',
            type: 'object',
            optional: false,
            array: false,
            constraints: [],
            fields: [{ name: 'tag', type: 'string', optional: true, array: true, constraints: [{ name: 'maxLength', value: 8 }] }],
          }],
        },
      },
      endpoints: {},
    })).toBe(true)
  })

  it('rejects out-of-range status codes', () => {
    const document = {
      irVersion: '1.0',
      entities: {},
      endpoints: {
        Ping: {
          source: 'ping.endpoint.spec',
          method: 'GET',
          path: '/ping',
          pathParams: [],
          headers: null,
          params: null,
          query: null,
          body: null,
          responses: { ok: { status: 700, headers: null, body: null } },
        },
      },
    }
    expect(validateDocument(document)).toBe(false)
    expect(validateDocument.errors?.[0].instancePath).toBe('/endpoints/Ping/responses/ok/status')
  })
})
