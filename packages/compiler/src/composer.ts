import type { Diagnostic } from 'shared'
import type {
  Block,
  CopyNode,
  DataDeclaration,
  EndpointDeclaration,
  FieldNode,
  Position,
  SectionNode,
  SectionRole,
  SpecFile,
} from './ast.js'
import type { ImportGraph } from './import-graph.js'
import {
  cloneField,
  describeFieldType,
  type ResolvedEndpoint,
  type ResolvedEntity,
  type ResolvedField,
  type ResolvedGraph,
  type ResolvedScenario,
  type ResolvedSection,
} from './model.js'

interface Registration {
  kind: 'data' | 'endpoint'
  file: string
}

interface PendingReference extends Position {
  field: string
  name: string
}

interface FileScope {
  file: SpecFile
  visible: Set<string>
  references: PendingReference[]
}

export interface Composition {
  graph: ResolvedGraph
  diagnostics: Diagnostic[]
}

/**
 * Per-run symbol table. Expands `>Name` copies into flat field lists and
 * checks `#Name` references, file by file in import order. Errors are
 * collected and composition carries on with whatever could be resolved.
 */
export class Composer {
  private readonly registry = new Map<string, Registration>()
  private readonly entities = new Map<string, ResolvedEntity>()
  private readonly endpoints = new Map<string, ResolvedEndpoint>()
  private readonly diagnostics: Diagnostic[] = []

  constructor(private readonly imports: ImportGraph) {}

  compose(files: SpecFile[]): Composition {
    const byPath = new Map(files.map(f => [f.path, f]))
    for (const path of this.imports.order) {
      const file = byPath.get(path)
      if (file) this.composeFile(file)
    }
    return {
      graph: { entities: this.entities, endpoints: this.endpoints },
      diagnostics: this.diagnostics,
    }
  }

  private composeFile(file: SpecFile): void {
    const scope: FileScope = {
      file,
      visible: new Set([file.path, ...(this.imports.closure.get(file.path) ?? [])]),
      references: [],
    }

    for (const declaration of file.declarations) {
      const existing = this.registry.get(declaration.name)
      if (existing) {
        this.diagnostics.push({
          kind: 'DuplicateNameError',
          severity: 'error',
          message: `'${declaration.name}' is already declared in ${existing.file}`,
          file: file.path,
          line: declaration.line,
          column: declaration.column,
          name: declaration.name,
          firstFile: existing.file,
          secondFile: file.path,
        })
        continue
      }
      this.registry.set(declaration.name, { kind: declaration.kind, file: file.path })

      if (declaration.kind === 'data') {
        this.entities.set(declaration.name, this.composeEntity(declaration, scope))
      } else {
        this.endpoints.set(declaration.name, this.composeEndpoint(declaration, scope))
      }
    }

    // References are checked once the whole file is registered, so entities
    // may point at declarations further down the same file, or at themselves.
    for (const reference of scope.references) {
      const problem = this.lookupProblem(reference.name, scope)
      if (problem === null) continue
      this.diagnostics.push({
        kind: 'UnknownReferenceError',
        severity: 'error',
        message: `Field '${reference.field}' references ${problem}`,
        file: file.path,
        line: reference.line,
        column: reference.column,
        field: reference.field,
        name: reference.name,
      })
    }
  }

  private composeEntity(declaration: DataDeclaration, scope: FileScope): ResolvedEntity {
    return {
      name: declaration.name,
      file: scope.file.path,
      line: declaration.line,
      column: declaration.column,
      fields: this.composeBlock(declaration.body, declaration.name, '', scope),
    }
  }

  private composeEndpoint(declaration: EndpointDeclaration, scope: FileScope): ResolvedEndpoint {
    if (scope.file.kind === 'data') {
      this.diagnostics.push({
        kind: 'FileKindMismatchWarning',
        severity: 'warning',
        message: `Endpoint '${declaration.name}' is declared in a data file`,
        file: scope.file.path,
        line: declaration.line,
        column: declaration.column,
        declaration: declaration.name,
      })
    }

    const sections: Partial<Record<SectionRole, ResolvedSection>> = {}
    for (const section of declaration.sections) {
      sections[section.role] = this.composeSection(section, declaration.name, section.role, scope)
    }

    const responses: ResolvedScenario[] = declaration.responses.map(scenario => {
      const prefix = `response.${scenario.name}`
      return {
        name: scenario.name,
        status: scenario.status,
        ...(scenario.headers
          ? { headers: this.composeSection(scenario.headers, declaration.name, `${prefix}.headers`, scope) }
          : {}),
        ...(scenario.body
          ? { body: this.composeSection(scenario.body, declaration.name, `${prefix}.body`, scope) }
          : {}),
        line: scenario.line,
        column: scenario.column,
      }
    })

    return {
      name: declaration.name,
      file: scope.file.path,
      line: declaration.line,
      column: declaration.column,
      method: declaration.method,
      path: declaration.path,
      sections,
      responses,
    }
  }

  private composeSection<R extends SectionRole>(
    section: SectionNode<R>,
    owner: string,
    path: string,
    scope: FileScope,
  ): ResolvedSection {
    const base = { role: section.role, array: section.type.array, line: section.line, column: section.column }

    if (section.type.kind === 'object') {
      return { ...base, fields: this.composeBlock(section.type.block, owner, path, scope) }
    }

    const target = section.type.target
    const entity = this.resolvedEntity(target, scope)
    if (typeof entity === 'string') {
      this.diagnostics.push({
        kind: 'UnknownReferenceError',
        severity: 'error',
        message: `Section '${path}' references ${entity}`,
        file: scope.file.path,
        line: section.line,
        column: section.column,
        field: path,
        name: target,
      })
      return { ...base, target, fields: [] }
    }
    return { ...base, target, fields: entity.fields.map(cloneField) }
  }

  private composeBlock(block: Block, owner: string, path: string, scope: FileScope): ResolvedField[] {
    const fields: ResolvedField[] = []
    const slots = new Map<string, number>()

    for (const copy of block.copies) {
      const source = this.copySource(copy, owner, scope)
      if (!source) continue
      for (const field of source.fields) {
        // first-listed source wins a name collision
        if (slots.has(field.name)) continue
        slots.set(field.name, fields.length)
        fields.push({ ...cloneField(field), inheritedFrom: field.inheritedFrom ?? source.name })
      }
    }

    const local = new Set<string>()
    for (const node of block.fields) {
      const field = this.resolveField(node, owner, path, scope)
      const slot = slots.get(node.name)
      if (slot === undefined) {
        slots.set(node.name, fields.length)
        fields.push(field)
      } else {
        const previous = fields[slot]
        if (local.has(node.name)) {
          this.diagnostics.push({
            kind: 'DuplicateFieldWarning',
            severity: 'warning',
            message: `Field '${node.name}' is declared more than once in '${owner}'`,
            file: scope.file.path,
            line: node.line,
            column: node.column,
            declaration: owner,
            field: node.name,
          })
        } else if (describeFieldType(previous) !== describeFieldType(field)) {
          this.diagnostics.push({
            kind: 'TypeChangingOverrideWarning',
            severity: 'warning',
            message: `Field '${node.name}' in '${owner}' overrides ${describeFieldType(previous)} from '${previous.inheritedFrom ?? owner}' with ${describeFieldType(field)}`,
            file: scope.file.path,
            line: node.line,
            column: node.column,
            declaration: owner,
            field: node.name,
            inheritedType: describeFieldType(previous),
            localType: describeFieldType(field),
          })
        }
        fields[slot] = field
      }
      local.add(node.name)
    }

    return fields
  }

  private resolveField(node: FieldNode, owner: string, path: string, scope: FileScope): ResolvedField {
    const fieldPath = path ? `${path}.${node.name}` : node.name
    const base = {
      name: node.name,
      optional: node.optional,
      array: node.type.array,
      constraints: node.constraints.map(c => ({ ...c })),
      ...(node.enumValues ? { enumValues: node.enumValues.map(v => ({ ...v })) } : {}),
      file: scope.file.path,
      line: node.line,
      column: node.column,
    }

    switch (node.type.kind) {
      case 'primitive':
        return { ...base, baseType: node.type.name }
      case 'reference':
        scope.references.push({ field: fieldPath, name: node.type.target, line: node.line, column: node.column })
        return { ...base, baseType: 'reference', target: node.type.target }
      case 'object':
        return { ...base, baseType: 'object', fields: this.composeBlock(node.type.block, owner, fieldPath, scope) }
    }
  }

  private copySource(copy: CopyNode, owner: string, scope: FileScope): ResolvedEntity | null {
    const entity = this.resolvedEntity(copy.name, scope)
    if (typeof entity !== 'string') return entity
    this.diagnostics.push({
      kind: 'UnknownCopySourceError',
      severity: 'error',
      message: `Cannot copy into '${owner}': ${entity}`,
      file: scope.file.path,
      line: copy.line,
      column: copy.column,
      declaration: owner,
      name: copy.name,
    })
    return null
  }

  /** The composed entity, or a description of why it cannot be used */
  private resolvedEntity(name: string, scope: FileScope): ResolvedEntity | string {
    const problem = this.lookupProblem(name, scope)
    if (problem !== null) return problem
    return this.entities.get(name) ?? `'${name}', which is not resolved yet; declare it before use`
  }

  private lookupProblem(name: string, scope: FileScope): string | null {
    const registration = this.registry.get(name)
    if (!registration) return `unknown entity '${name}'`
    if (!scope.visible.has(registration.file)) {
      return `'${name}' from ${registration.file}, which is not imported by ${scope.file.path}`
    }
    if (registration.kind !== 'data') return `'${name}', which is an endpoint, not a data declaration`
    return null
  }
}

export function compose(files: SpecFile[], imports: ImportGraph): Composition {
  return new Composer(imports).compose(files)
}
