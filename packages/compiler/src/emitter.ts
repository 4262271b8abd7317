import AjvModule from 'ajv'
import {
  IR_VERSION,
  irDocumentSchema,
  type IRDocument,
  type IREndpoint,
  type IRField,
  type IRLiteral,
  type IRResponse,
  type IRSection,
  type Result,
  type ValidationError,
} from 'shared'
import type { EnumLiteral } from './ast.js'
import { pathParameters, type BaseType, type ResolvedField, type ResolvedGraph, type ResolvedSection } from './model.js'

const Ajv = AjvModule.default
const ajv = new Ajv({ allErrors: true, allowUnionTypes: true })
const validateDocument = ajv.compile(irDocumentSchema)

function toLiteral(baseType: BaseType, value: EnumLiteral): IRLiteral {
  if (baseType === 'number' && value.literal === 'number') return Number(value.text)
  if (baseType === 'boolean' && value.literal === 'word') return value.text === 'true'
  return value.text
}

function toField(field: ResolvedField): IRField {
  return {
    name: field.name,
    type: field.baseType,
    optional: field.optional,
    array: field.array,
    constraints: field.constraints.map(c => (c.value === undefined ? { name: c.name } : { name: c.name, value: c.value })),
    ...(field.enumValues ? { enum: field.enumValues.map(v => toLiteral(field.baseType, v)) } : {}),
    ...(field.target ? { reference: field.target } : {}),
    ...(field.fields ? { fields: field.fields.map(toField) } : {}),
  }
}

function toSection(section: ResolvedSection | undefined): IRSection | null {
  if (!section) return null
  return {
    ...(section.target ? { reference: section.target } : {}),
    array: section.array,
    fields: section.fields.map(toField),
  }
}

function sortedEntries<T>(map: Map<string, T>): Array<[string, T]> {
  return [...map].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
}

/**
 * Lower a composed and validated graph into the IR document. Entity and
 * endpoint keys are sorted so equal inputs serialise to equal bytes.
 */
export function emitIR(graph: ResolvedGraph): IRDocument {
  const entities = Object.fromEntries(
    sortedEntries(graph.entities).map(([name, entity]) => [
      name,
      { source: entity.file, fields: entity.fields.map(toField) },
    ]),
  )

  const endpoints = Object.fromEntries(
    sortedEntries(graph.endpoints).map(([name, endpoint]): [string, IREndpoint] => {
      const responses = Object.fromEntries(
        endpoint.responses.map((scenario): [string, IRResponse] => [scenario.name, {
          status: scenario.status,
          headers: toSection(scenario.headers),
          body: toSection(scenario.body),
        }]),
      )
      return [name, {
        source: endpoint.file,
        method: endpoint.method,
        path: endpoint.path,
        pathParams: pathParameters(endpoint.path),
        headers: toSection(endpoint.sections.headers),
        params: toSection(endpoint.sections.params),
        query: toSection(endpoint.sections.query),
        body: toSection(endpoint.sections.body),
        responses,
      }]
    }),
  )

  return { irVersion: IR_VERSION, entities, endpoints }
}

export function serializeIR(document: IRDocument): string {
  return `${JSON.stringify(document, null, 2)}\n`
}

/** Check a document (for example one read back from disk) against the IR schema */
export function validateIRDocument(document: unknown): Result<true, ValidationError[]> {
  if (validateDocument(document)) return { ok: true, value: true }
  return {
    ok: false,
    error: (validateDocument.errors ?? []).map(e => ({
      path: e.instancePath || '/',
      message: e.message ?? 'Unknown validation error',
    })),
  }
}
