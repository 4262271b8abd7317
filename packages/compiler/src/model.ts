import type { HttpMethod } from 'shared'
import type { ConstraintNode, EnumLiteral, SectionRole } from './ast.js'

export type BaseType = 'string' | 'number' | 'boolean' | 'object' | 'reference'

export interface ResolvedField {
  name: string
  optional: boolean
  array: boolean
  baseType: BaseType
  constraints: ConstraintNode[]
  enumValues?: EnumLiteral[]
  /** Entity a `reference` field points at */
  target?: string
  /** Members of an inline `object` field */
  fields?: ResolvedField[]
  /** File and position where the field was written */
  file: string
  line: number
  column: number
  /** Declaration the field was copied from, when it came in through `>Name` */
  inheritedFrom?: string
}

export interface ResolvedEntity {
  name: string
  file: string
  line: number
  column: number
  fields: ResolvedField[]
}

export interface ResolvedSection {
  role: SectionRole
  array: boolean
  fields: ResolvedField[]
  /** Set when the section was written as `#Name`; fields are a copy of the target's */
  target?: string
  line: number
  column: number
}

export interface ResolvedScenario {
  name: string
  status: number
  headers?: ResolvedSection
  body?: ResolvedSection
  line: number
  column: number
}

export interface ResolvedEndpoint {
  name: string
  file: string
  line: number
  column: number
  method: HttpMethod
  path: string
  sections: Partial<Record<SectionRole, ResolvedSection>>
  responses: ResolvedScenario[]
}

export interface ResolvedGraph {
  /** In registration order, i.e. topological file order then declaration order */
  entities: Map<string, ResolvedEntity>
  endpoints: Map<string, ResolvedEndpoint>
}

export function cloneField(field: ResolvedField): ResolvedField {
  return {
    ...field,
    constraints: field.constraints.map(c => ({ ...c })),
    ...(field.enumValues ? { enumValues: field.enumValues.map(v => ({ ...v })) } : {}),
    ...(field.fields ? { fields: field.fields.map(cloneField) } : {}),
  }
}

/** Type as written: `#Target`, a primitive, or the member list of an inline object */
export function describeFieldType(field: ResolvedField): string {
  let base: string = field.baseType
  if (field.baseType === 'reference' && field.target) {
    base = `#${field.target}`
  } else if (field.fields) {
    const members = field.fields.map(f => `${f.name}${f.optional ? '?' : ''} ${describeFieldType(f)}`)
    base = members.length > 0 ? `{ ${members.join(', ')} }` : '{}'
  }
  return field.array ? `${base}[]` : base
}

const PATH_PARAM = /:([A-Za-z_][A-Za-z0-9_]*)/g

/** `:name` placeholders of a path template, in order of appearance */
export function pathParameters(path: string): string[] {
  return [...path.matchAll(PATH_PARAM)].map(m => m[1])
}
