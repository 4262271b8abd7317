import type { HttpMethod } from 'shared'

export const PRIMITIVE_TYPES = ['string', 'number', 'boolean'] as const
export type PrimitiveType = (typeof PRIMITIVE_TYPES)[number]

export const SECTION_ROLES = ['headers', 'params', 'query', 'body'] as const
export type SectionRole = (typeof SECTION_ROLES)[number]

export interface Position {
  line: number
  column: number
}

export interface ImportNode extends Position {
  path: string
}

/** `>Name` inside a block; expanded by the composer, never by the parser */
export interface CopyNode extends Position {
  name: string
}

export interface ConstraintNode extends Position {
  name: string
  value?: string | number
}

export interface EnumLiteral {
  text: string
  literal: 'word' | 'number' | 'string'
}

export type TypeNode =
  | { kind: 'primitive'; name: PrimitiveType; array: boolean }
  | { kind: 'reference'; target: string; array: boolean }
  | { kind: 'object'; block: Block; array: boolean }

export type SectionType = Exclude<TypeNode, { kind: 'primitive' }>

export interface FieldNode extends Position {
  name: string
  optional: boolean
  type: TypeNode
  constraints: ConstraintNode[]
  enumValues?: EnumLiteral[]
}

export interface Block {
  copies: CopyNode[]
  fields: FieldNode[]
}

export interface SectionNode<R extends string = SectionRole> extends Position {
  role: R
  type: SectionType
}

export interface ScenarioNode extends Position {
  name: string
  status: number
  headers?: SectionNode<'headers'>
  body?: SectionNode<'body'>
}

export interface DataDeclaration extends Position {
  kind: 'data'
  name: string
  body: Block
}

export interface EndpointDeclaration extends Position {
  kind: 'endpoint'
  name: string
  method: HttpMethod
  path: string
  sections: SectionNode[]
  responses: ScenarioNode[]
}

export type Declaration = DataDeclaration | EndpointDeclaration

export type SpecFileKind = 'data' | 'endpoint' | 'other'

export interface SpecFile {
  /** Root-relative path with forward slashes; the file's identity */
  path: string
  kind: SpecFileKind
  imports: ImportNode[]
  declarations: Declaration[]
}
