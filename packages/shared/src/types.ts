export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export type ValidationError = {
  path: string
  message: string
}

export type Severity = 'error' | 'warning'

export interface SourceLocation {
  file: string
  line: number
  column: number
}

/**
 * Kind-specific payload of every diagnostic the compiler can report.
 * The key is the stable, machine-readable kind printed by every reporter.
 */
export interface DiagnosticDetails {
  IoError: Record<never, never>
  LexError: Record<never, never>
  ParseError: { expected: string; found: string }
  UnresolvedImportError: { path: string }
  CyclicImportError: { cycle: string[] }
  UnknownCopySourceError: { declaration: string; name: string }
  UnknownReferenceError: { field: string; name: string }
  DuplicateNameError: { name: string; firstFile: string; secondFile: string }
  IncompatibleConstraintError: { field: string; constraint: string; baseType: string }
  EnumTypeMismatchError: { field: string; value: string; baseType: string }
  InvalidConstraintParameterError: { field: string; constraint: string; expected: string }
  ConflictingConstraintsError: { field: string; constraints: string[] }
  PathParameterMismatchError: { endpoint: string; parameter: string }
  InvalidStatusCodeError: { endpoint: string; scenario: string; status: number }
  TypeChangingOverrideWarning: { declaration: string; field: string; inheritedType: string; localType: string }
  DuplicateFieldWarning: { declaration: string; field: string }
  UnknownConstraintWarning: { field: string; constraint: string }
  FileKindMismatchWarning: { declaration: string }
}

export type DiagnosticKind = keyof DiagnosticDetails

export type Diagnostic = {
  [K in DiagnosticKind]: SourceLocation & {
    kind: K
    severity: Severity
    message: string
  } & DiagnosticDetails[K]
}[DiagnosticKind]

export type DiagnosticOf<K extends DiagnosticKind> = Extract<Diagnostic, { kind: K }>

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'] as const
export type HttpMethod = (typeof HTTP_METHODS)[number]

export type ConstraintTarget = 'string' | 'number' | 'boolean' | 'array'
export type ConstraintParameter = 'none' | 'number' | 'integer' | 'string'

export interface ConstraintRule {
  types: ConstraintTarget[]
  parameter: ConstraintParameter
}

export interface SpecmlConfig {
  extensions: string[]
  output: string
  strict: boolean
  constraints: Record<string, ConstraintRule>
}
