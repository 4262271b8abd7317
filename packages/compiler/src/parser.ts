import { HTTP_METHODS, type Diagnostic, type HttpMethod, type Result } from 'shared'
import { LexError, tokenize, type Token, type TokenKind } from './lexer.js'
import {
  PRIMITIVE_TYPES,
  SECTION_ROLES,
  type Block,
  type ConstraintNode,
  type Declaration,
  type EndpointDeclaration,
  type EnumLiteral,
  type FieldNode,
  type ImportNode,
  type Position,
  type PrimitiveType,
  type ScenarioNode,
  type SectionNode,
  type SectionType,
  type SpecFile,
  type SpecFileKind,
  type TypeNode,
} from './ast.js'

export class ParseError extends Error {
  constructor(
    public readonly expected: string,
    public readonly found: string,
    public readonly line: number,
    public readonly column: number,
  ) {
    super(`Expected ${expected} but found ${found}`)
    this.name = 'ParseError'
  }
}

// Blocks are parsed into raw members first; whether `status 201` or
// `headers { ... }` is legal depends on the enclosing declaration, which is
// only known once the whole block has been read.
interface RawBlock extends Position {
  members: RawMember[]
}

type RawType =
  | Exclude<TypeNode, { kind: 'object' }>
  | { kind: 'object'; block: RawBlock; array: boolean }

interface RawField extends Position {
  kind: 'field'
  name: string
  optional: boolean
  type: RawType
  constraints: ConstraintNode[]
  enumValues?: EnumLiteral[]
}

interface RawCopy extends Position {
  kind: 'copy'
  name: string
}

interface RawDirective extends Position {
  kind: 'directive'
  name: 'method' | 'path' | 'status'
  value: string
}

type RawMember = RawField | RawCopy | RawDirective

const DECLARATION_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/
const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_-]*$/
const HTTP_VERB = /^[A-Z]+$/

function describe(token: Token): string {
  switch (token.kind) {
    case 'eof':
      return 'end of file'
    case 'newline':
      return 'end of line'
    default:
      return `'${token.text}'`
  }
}

function describeMember(member: RawMember): string {
  return member.kind === 'copy' ? `'>${member.name}'` : `'${member.name}'`
}

function isPrimitive(name: string): name is PrimitiveType {
  return PRIMITIVE_TYPES.some(p => p === name)
}

class Parser {
  private pos = 0

  constructor(private readonly tokens: Token[]) {}

  parseFile(): { imports: ImportNode[]; declarations: Declaration[] } {
    const imports: ImportNode[] = []
    const declarations: Declaration[] = []

    for (;;) {
      this.skipNewlines()
      if (this.check('eof')) break

      if (this.check('word', 'import') && this.peek(1).kind === 'path') {
        const keyword = this.advance()
        const target = this.advance()
        this.endOfLine()
        imports.push({ path: target.text, line: keyword.line, column: keyword.column })
        continue
      }

      declarations.push(this.parseDeclaration())
    }

    return { imports, declarations }
  }

  private parseDeclaration(): Declaration {
    const name = this.peek()
    if (name.kind !== 'word' || !DECLARATION_NAME.test(name.text)) {
      throw this.error('declaration name')
    }
    this.advance()
    const block = this.parseBlock()
    this.endOfLine()

    const isEndpoint = block.members.some(m => m.kind === 'directive')
    if (!isEndpoint) {
      return { kind: 'data', name: name.text, body: toBlock(block), line: name.line, column: name.column }
    }
    return toEndpoint(name, block)
  }

  private parseBlock(): RawBlock {
    const open = this.consume('lbrace', "'{'")
    const members: RawMember[] = []

    for (;;) {
      this.skipNewlines()
      if (this.match('rbrace')) break
      if (this.check('eof')) throw this.error("'}'")
      members.push(this.parseMember())
      this.endOfMember()
    }

    return { members, line: open.line, column: open.column }
  }

  private parseMember(): RawMember {
    const start = this.peek()

    if (start.kind === 'rangle') {
      this.advance()
      const name = this.parseEntityName('copy source name')
      return { kind: 'copy', name, line: start.line, column: start.column }
    }

    if (start.kind !== 'word' || !FIELD_NAME.test(start.text)) {
      throw this.error('field name')
    }

    return this.parseDirective() ?? this.parseField()
  }

  private parseDirective(): RawDirective | null {
    const start = this.peek()
    const value = this.peek(1)
    const after = this.peek(2).kind
    if (after !== 'newline' && after !== 'rbrace' && after !== 'eof') return null

    let name: RawDirective['name'] | null = null
    if (start.text === 'method' && value.kind === 'word' && HTTP_VERB.test(value.text)) name = 'method'
    else if (start.text === 'path' && value.kind === 'path') name = 'path'
    else if (start.text === 'status' && value.kind === 'number') name = 'status'
    if (name === null) return null

    this.pos += 2
    return { kind: 'directive', name, value: value.text, line: start.line, column: start.column }
  }

  private parseField(): RawField {
    const name = this.advance()
    let array = this.matchArray()
    let optional = this.match('question')
    const base = { kind: 'field' as const, name: name.text, line: name.line, column: name.column }

    if (this.match('hash')) {
      const target = this.parseEntityName('referenced entity name')
      array = this.matchArray() || array
      optional = this.match('question') || optional
      return { ...base, optional, type: { kind: 'reference', target, array }, constraints: [] }
    }

    if (this.check('lbrace')) {
      const block = this.parseBlock()
      return { ...base, optional, type: { kind: 'object', block, array }, constraints: [] }
    }

    const typeName = this.parseEntityName('field type')
    array = this.matchArray() || array
    const constraints = this.check('langle') ? this.parseConstraints() : []
    const enumValues = this.check('lparen') ? this.parseEnum() : undefined
    const type: RawType = isPrimitive(typeName)
      ? { kind: 'primitive', name: typeName, array }
      : { kind: 'reference', target: typeName, array }

    return { ...base, optional, type, constraints, ...(enumValues ? { enumValues } : {}) }
  }

  private parseConstraints(): ConstraintNode[] {
    this.consume('langle', "'<'")
    const constraints: ConstraintNode[] = []

    do {
      const name = this.peek()
      if (name.kind !== 'word') throw this.error('constraint name')
      this.advance()

      let value: string | number | undefined
      if (this.match('colon')) {
        const token = this.peek()
        if (token.kind === 'number') value = Number(token.text)
        else if (token.kind === 'word' || token.kind === 'string') value = token.text
        else throw this.error('constraint value')
        this.advance()
      }

      constraints.push({
        name: name.text,
        ...(value !== undefined ? { value } : {}),
        line: name.line,
        column: name.column,
      })
    } while (this.match('pipe'))

    this.consume('rangle', "'|' or '>'")
    return constraints
  }

  private parseEnum(): EnumLiteral[] {
    this.consume('lparen', "'('")
    const values: EnumLiteral[] = []

    do {
      const token = this.peek()
      if (token.kind !== 'word' && token.kind !== 'number' && token.kind !== 'string') {
        throw this.error('enum value')
      }
      this.advance()
      values.push({ text: token.text, literal: token.kind })
    } while (this.match('pipe'))

    this.consume('rparen', "'|' or ')'")
    return values
  }

  private parseEntityName(expected: string): string {
    const token = this.peek()
    if (token.kind !== 'word' || !DECLARATION_NAME.test(token.text)) throw this.error(expected)
    this.advance()
    return token.text
  }

  private matchArray(): boolean {
    if (!this.check('lbracket')) return false
    this.advance()
    this.consume('rbracket', "']'")
    return true
  }

  private endOfMember(): void {
    if (this.match('newline')) return
    if (this.check('rbrace')) return
    throw this.error('end of line')
  }

  private endOfLine(): void {
    if (this.match('newline') || this.check('eof')) return
    throw this.error('end of line')
  }

  private skipNewlines(): void {
    while (this.match('newline')) {
      // consumed
    }
  }

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)]
  }

  private check(kind: TokenKind, text?: string): boolean {
    const token = this.peek()
    return token.kind === kind && (text === undefined || token.text === text)
  }

  private advance(): Token {
    const token = this.peek()
    if (token.kind !== 'eof') this.pos++
    return token
  }

  private match(kind: TokenKind): boolean {
    if (!this.check(kind)) return false
    this.advance()
    return true
  }

  private consume(kind: TokenKind, expected: string): Token {
    if (!this.check(kind)) throw this.error(expected)
    return this.advance()
  }

  private error(expected: string): ParseError {
    const token = this.peek()
    return new ParseError(expected, describe(token), token.line, token.column)
  }
}

function toBlock(raw: RawBlock): Block {
  const block: Block = { copies: [], fields: [] }
  for (const member of raw.members) {
    switch (member.kind) {
      case 'copy':
        block.copies.push({ name: member.name, line: member.line, column: member.column })
        break
      case 'field':
        block.fields.push(toField(member))
        break
      case 'directive':
        throw new ParseError('field or copy source', describeMember(member), member.line, member.column)
    }
  }
  return block
}

function toField(raw: RawField): FieldNode {
  const type: TypeNode = raw.type.kind === 'object'
    ? { kind: 'object', block: toBlock(raw.type.block), array: raw.type.array }
    : raw.type
  return {
    name: raw.name,
    optional: raw.optional,
    type,
    constraints: raw.constraints,
    ...(raw.enumValues ? { enumValues: raw.enumValues } : {}),
    line: raw.line,
    column: raw.column,
  }
}

function toSection<R extends string>(raw: RawField, role: R): SectionNode<R> {
  let type: SectionType
  switch (raw.type.kind) {
    case 'object':
      type = { kind: 'object', block: toBlock(raw.type.block), array: raw.type.array }
      break
    case 'reference':
      type = raw.type
      break
    case 'primitive':
      throw new ParseError(`'{' or '#' after '${role}'`, `'${raw.type.name}'`, raw.line, raw.column)
  }
  return { role, type, line: raw.line, column: raw.column }
}

function toEndpoint(name: Token, raw: RawBlock): EndpointDeclaration {
  let method: HttpMethod | undefined
  let path: string | undefined
  let responses: ScenarioNode[] | undefined
  const sections: SectionNode[] = []

  for (const member of raw.members) {
    if (member.kind === 'directive') {
      if (member.name === 'method') {
        if (method) throw new ParseError('a single method', describeMember(member), member.line, member.column)
        method = HTTP_METHODS.find(m => m === member.value)
        if (!method) throw new ParseError('HTTP method', `'${member.value}'`, member.line, member.column)
      } else if (member.name === 'path') {
        if (path) throw new ParseError('a single path', describeMember(member), member.line, member.column)
        if (!member.value.startsWith('/')) throw new ParseError('URL path', `'${member.value}'`, member.line, member.column)
        path = member.value
      } else {
        throw new ParseError('endpoint section', describeMember(member), member.line, member.column)
      }
      continue
    }

    if (member.kind === 'copy') {
      throw new ParseError('endpoint section', describeMember(member), member.line, member.column)
    }

    if (member.name === 'response') {
      if (responses) throw new ParseError('a single response block', describeMember(member), member.line, member.column)
      responses = toResponses(member)
      continue
    }

    const role = SECTION_ROLES.find(r => r === member.name)
    if (!role) {
      throw new ParseError("'headers', 'params', 'query', 'body' or 'response'", describeMember(member), member.line, member.column)
    }
    if (sections.some(s => s.role === role)) {
      throw new ParseError(`a single '${role}' section`, describeMember(member), member.line, member.column)
    }
    sections.push(toSection(member, role))
  }

  if (!method) throw new ParseError("'method' directive", `'${name.text}' without one`, name.line, name.column)
  if (!path) throw new ParseError("'path' directive", `'${name.text}' without one`, name.line, name.column)

  return {
    kind: 'endpoint',
    name: name.text,
    method,
    path,
    sections,
    responses: responses ?? [],
    line: name.line,
    column: name.column,
  }
}

function toResponses(raw: RawField): ScenarioNode[] {
  if (raw.type.kind !== 'object' || raw.type.array) {
    throw new ParseError("'{' after 'response'", describeMember(raw), raw.line, raw.column)
  }

  const scenarios: ScenarioNode[] = []
  for (const member of raw.type.block.members) {
    if (member.kind !== 'field' || member.type.kind !== 'object') {
      throw new ParseError('response scenario', describeMember(member), member.line, member.column)
    }
    if (scenarios.some(s => s.name === member.name)) {
      throw new ParseError('unique scenario name', describeMember(member), member.line, member.column)
    }
    scenarios.push(toScenario(member, member.type.block))
  }
  return scenarios
}

function toScenario(raw: RawField, block: RawBlock): ScenarioNode {
  let status: number | undefined
  let headers: SectionNode<'headers'> | undefined
  let body: SectionNode<'body'> | undefined

  for (const member of block.members) {
    if (member.kind === 'directive' && member.name === 'status' && status === undefined) {
      status = Number(member.value)
    } else if (member.kind === 'field' && member.name === 'headers' && !headers) {
      headers = toSection(member, 'headers')
    } else if (member.kind === 'field' && member.name === 'body' && !body) {
      body = toSection(member, 'body')
    } else {
      throw new ParseError("'status', 'headers' or 'body'", describeMember(member), member.line, member.column)
    }
  }

  if (status === undefined) {
    throw new ParseError("'status' directive", `scenario '${raw.name}' without one`, raw.line, raw.column)
  }

  return {
    name: raw.name,
    status,
    ...(headers ? { headers } : {}),
    ...(body ? { body } : {}),
    line: raw.line,
    column: raw.column,
  }
}

export function specFileKind(path: string): SpecFileKind {
  if (/\.data\.[^./]+$/.test(path)) return 'data'
  if (/\.endpoint\.[^./]+$/.test(path)) return 'endpoint'
  return 'other'
}

/**
 * Parse one spec file. Parsing is atomic: the first lexical or syntax error
 * aborts the file and no partial AST is returned.
 */
export function parseSpecFile(text: string, path: string): Result<SpecFile, Diagnostic> {
  try {
    const { imports, declarations } = new Parser(tokenize(text)).parseFile()
    return { ok: true, value: { path, kind: specFileKind(path), imports, declarations } }
  } catch (error) {
    if (error instanceof LexError) {
      return {
        ok: false,
        error: { kind: 'LexError', severity: 'error', message: error.message, file: path, line: error.line, column: error.column },
      }
    }
    if (error instanceof ParseError) {
      return {
        ok: false,
        error: {
          kind: 'ParseError', severity: 'error', message: error.message,
          file: path, line: error.line, column: error.column,
          expected: error.expected, found: error.found,
        },
      }
    }
    throw error
  }
}
