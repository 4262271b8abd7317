import type { ConstraintRule, Diagnostic } from 'shared'
import type { ConstraintNode, EnumLiteral, SectionRole } from './ast.js'
import { DEFAULT_CONSTRAINT_RULES } from './constraints.js'
import {
  pathParameters,
  type BaseType,
  type ResolvedEndpoint,
  type ResolvedField,
  type ResolvedGraph,
  type ResolvedSection,
} from './model.js'

interface Located {
  diagnostic: Diagnostic
  declaration: string
  path: string
}

interface Scope {
  file: string
  declaration: string
}

const SECTION_ORDER: SectionRole[] = ['headers', 'params', 'query', 'body']

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

function typeLabel(field: ResolvedField): string {
  return field.array ? `${field.baseType}[]` : field.baseType
}

function enumAccepts(baseType: BaseType, value: EnumLiteral): boolean {
  switch (baseType) {
    case 'string':
      return true
    case 'number':
      return value.literal === 'number'
    case 'boolean':
      return value.literal === 'word' && (value.text === 'true' || value.text === 'false')
    default:
      return false
  }
}

function parameterProblem(rule: ConstraintRule, value: string | number | undefined): string | null {
  switch (rule.parameter) {
    case 'none':
      return value === undefined ? null : 'no parameter'
    case 'number':
      return typeof value === 'number' ? null : 'a number'
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? null : 'a non-negative integer'
    case 'string':
      return typeof value === 'string' ? null : 'a string'
  }
}

/**
 * Checks constraints, enum literals and endpoint structure over the whole
 * resolved graph. Every violation is reported, ordered by file, declaration,
 * dotted field path and then position.
 */
export class ConstraintValidator {
  private found: Located[] = []

  constructor(private readonly rules: Record<string, ConstraintRule> = DEFAULT_CONSTRAINT_RULES) {}

  validate(graph: ResolvedGraph): Diagnostic[] {
    this.found = []

    for (const entity of graph.entities.values()) {
      this.checkFields(entity.fields, { file: entity.file, declaration: entity.name }, '')
    }

    for (const endpoint of graph.endpoints.values()) {
      const scope = { file: endpoint.file, declaration: endpoint.name }
      for (const role of SECTION_ORDER) {
        const section = endpoint.sections[role]
        if (section) this.checkSection(section, scope, role)
      }
      for (const scenario of endpoint.responses) {
        const prefix = `response.${scenario.name}`
        if (!Number.isInteger(scenario.status) || scenario.status < 100 || scenario.status > 599) {
          this.report(scope, prefix, {
            kind: 'InvalidStatusCodeError',
            severity: 'error',
            message: `Scenario '${scenario.name}' of '${endpoint.name}' has status ${scenario.status}; expected an integer from 100 to 599`,
            file: endpoint.file,
            line: scenario.line,
            column: scenario.column,
            endpoint: endpoint.name,
            scenario: scenario.name,
            status: scenario.status,
          })
        }
        if (scenario.headers) this.checkSection(scenario.headers, scope, `${prefix}.headers`)
        if (scenario.body) this.checkSection(scenario.body, scope, `${prefix}.body`)
      }
      this.checkPathParameters(endpoint)
    }

    return this.found
      .sort((a, b) =>
        compare(a.diagnostic.file, b.diagnostic.file) ||
        compare(a.declaration, b.declaration) ||
        compare(a.path, b.path) ||
        a.diagnostic.line - b.diagnostic.line ||
        a.diagnostic.column - b.diagnostic.column)
      .map(entry => entry.diagnostic)
  }

  private checkSection(section: ResolvedSection, scope: Scope, path: string): void {
    // `#Name` sections reuse the target's fields, which are checked on the entity itself
    if (section.target) return
    this.checkFields(section.fields, scope, path)
  }

  private checkFields(fields: ResolvedField[], scope: Scope, path: string): void {
    for (const field of fields) {
      if (field.inheritedFrom) continue
      const fieldPath = path ? `${path}.${field.name}` : field.name
      this.checkConstraints(field, scope, fieldPath)
      this.checkEnum(field, scope, fieldPath)
      if (field.fields) this.checkFields(field.fields, scope, fieldPath)
    }
  }

  private checkConstraints(field: ResolvedField, scope: Scope, path: string): void {
    const valid = new Map<string, ConstraintNode>()

    for (const constraint of field.constraints) {
      const rule = Object.hasOwn(this.rules, constraint.name) ? this.rules[constraint.name] : undefined
      if (!rule) {
        this.report(scope, path, {
          kind: 'UnknownConstraintWarning',
          severity: 'warning',
          message: `Unknown constraint '${constraint.name}' on field '${path}'`,
          file: field.file,
          line: constraint.line,
          column: constraint.column,
          field: path,
          constraint: constraint.name,
        })
        continue
      }

      const applies = (field.array && rule.types.includes('array')) || rule.types.some(t => t === field.baseType)
      if (!applies) {
        this.report(scope, path, {
          kind: 'IncompatibleConstraintError',
          severity: 'error',
          message: `Constraint '${constraint.name}' cannot be applied to field '${path}' of type ${typeLabel(field)}`,
          file: field.file,
          line: constraint.line,
          column: constraint.column,
          field: path,
          constraint: constraint.name,
          baseType: typeLabel(field),
        })
      }

      const expected = parameterProblem(rule, constraint.value)
      if (expected !== null) {
        this.report(scope, path, {
          kind: 'InvalidConstraintParameterError',
          severity: 'error',
          message: `Constraint '${constraint.name}' on field '${path}' takes ${expected}`,
          file: field.file,
          line: constraint.line,
          column: constraint.column,
          field: path,
          constraint: constraint.name,
          expected,
        })
      }

      if (applies && expected === null) valid.set(constraint.name, constraint)
    }

    this.checkConflicts(field, valid, scope, path)
  }

  private checkConflicts(field: ResolvedField, valid: Map<string, ConstraintNode>, scope: Scope, path: string): void {
    const numeric = (name: string): number | undefined => {
      const value = valid.get(name)?.value
      return typeof value === 'number' ? value : undefined
    }

    const conflict = (first: string, second: string): void => {
      const node = valid.get(second) ?? valid.get(first)
      this.report(scope, path, {
        kind: 'ConflictingConstraintsError',
        severity: 'error',
        message: `Constraints '${first}' and '${second}' on field '${path}' cannot both hold`,
        file: field.file,
        line: node?.line ?? field.line,
        column: node?.column ?? field.column,
        field: path,
        constraints: [first, second],
      })
    }

    const ordered = (low: string, high: string): void => {
      const lo = numeric(low)
      const hi = numeric(high)
      if (lo !== undefined && hi !== undefined && lo > hi) conflict(low, high)
    }

    ordered('min', 'max')
    ordered('minLength', 'maxLength')
    ordered('minLength', 'length')
    ordered('length', 'maxLength')
    ordered('minItems', 'maxItems')
    if (valid.has('uppercase') && valid.has('lowercase')) conflict('uppercase', 'lowercase')
  }

  private checkEnum(field: ResolvedField, scope: Scope, path: string): void {
    for (const value of field.enumValues ?? []) {
      if (enumAccepts(field.baseType, value)) continue
      this.report(scope, path, {
        kind: 'EnumTypeMismatchError',
        severity: 'error',
        message: `Enum value '${value.text}' of field '${path}' is not a valid ${field.baseType}`,
        file: field.file,
        line: field.line,
        column: field.column,
        field: path,
        value: value.text,
        baseType: typeLabel(field),
      })
    }
  }

  private checkPathParameters(endpoint: ResolvedEndpoint): void {
    const scope = { file: endpoint.file, declaration: endpoint.name }
    const inPath = pathParameters(endpoint.path)
    const params = endpoint.sections.params
    const declared = params?.fields.map(f => f.name) ?? []

    for (const parameter of inPath) {
      if (declared.includes(parameter)) continue
      this.report(scope, '', {
        kind: 'PathParameterMismatchError',
        severity: 'error',
        message: `Path parameter ':${parameter}' of '${endpoint.name}' has no field in params`,
        file: endpoint.file,
        line: endpoint.line,
        column: endpoint.column,
        endpoint: endpoint.name,
        parameter,
      })
    }

    for (const field of params?.fields ?? []) {
      if (inPath.includes(field.name)) continue
      const at = params?.target ? params : field
      this.report(scope, `params.${field.name}`, {
        kind: 'PathParameterMismatchError',
        severity: 'error',
        message: `Params field '${field.name}' of '${endpoint.name}' does not appear in path ${endpoint.path}`,
        file: endpoint.file,
        line: at.line,
        column: at.column,
        endpoint: endpoint.name,
        parameter: field.name,
      })
    }
  }

  private report(scope: Scope, path: string, diagnostic: Diagnostic): void {
    this.found.push({ diagnostic, declaration: scope.declaration, path })
  }
}

export function validateGraph(graph: ResolvedGraph, rules?: Record<string, ConstraintRule>): Diagnostic[] {
  return new ConstraintValidator(rules).validate(graph)
}
