import type { HttpMethod } from './types.js'

export const IR_VERSION = '1.0'

export type IRBaseType = 'string' | 'number' | 'boolean' | 'object' | 'reference'
export type IRLiteral = string | number | boolean

export interface IRConstraint {
  name: string
  value?: string | number
}

export interface IRField {
  name: string
  type: IRBaseType
  optional: boolean
  array: boolean
  constraints: IRConstraint[]
  enum?: IRLiteral[]
  /** Target entity name of a reference field */
  reference?: string
  /** Members of an inline object field */
  fields?: IRField[]
}

export interface IREntity {
  source: string
  fields: IRField[]
}

export interface IRSection {
  reference?: string
  array: boolean
  fields: IRField[]
}

export interface IRResponse {
  status: number
  headers: IRSection | null
  body: IRSection | null
}

export interface IREndpoint {
  source: string
  method: HttpMethod
  path: string
  pathParams: string[]
  headers: IRSection | null
  params: IRSection | null
  query: IRSection | null
  body: IRSection | null
  responses: Record<string, IRResponse>
}

export interface IRDocument {
  irVersion: typeof IR_VERSION
  entities: Record<string, IREntity>
  endpoints: Record<string, IREndpoint>
}
