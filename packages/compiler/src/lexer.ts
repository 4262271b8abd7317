export type TokenKind =
  | 'word'
  | 'number'
  | 'path'
  | 'string'
  | 'lbrace'
  | 'rbrace'
  | 'langle'
  | 'rangle'
  | 'lparen'
  | 'rparen'
  | 'lbracket'
  | 'rbracket'
  | 'hash'
  | 'question'
  | 'pipe'
  | 'colon'
  | 'comma'
  | 'newline'
  | 'eof'

export interface Token {
  kind: TokenKind
  text: string
  line: number
  column: number
}

const PUNCTUATION: Record<string, TokenKind> = {
  '{': 'lbrace',
  '}': 'rbrace',
  '<': 'langle',
  '>': 'rangle',
  '(': 'lparen',
  ')': 'rparen',
  '[': 'lbracket',
  ']': 'rbracket',
  '#': 'hash',
  '?': 'question',
  '|': 'pipe',
  ':': 'colon',
  ',': 'comma',
}

const WORD_START = /[A-Za-z0-9_\-.@*+]/
const WORD_CHAR = /[A-Za-z0-9_\-.@*+/]/
const NUMBER = /^-?\d+(\.\d+)?$/
const ESCAPES: Record<string, string> = { n: '\n', t: '\t', '\\': '\\', '"': '"', "'": "'" }

export class LexError extends Error {
  constructor(
    message: string,
    public readonly line: number,
    public readonly column: number,
  ) {
    super(message)
    this.name = 'LexError'
  }
}

/**
 * Lazy token stream over one spec file. Every iteration starts again from the
 * first character, so the same lexer can be walked any number of times.
 * Comments are dropped and runs of line breaks collapse into one `newline`.
 */
export class Lexer implements Iterable<Token> {
  constructor(private readonly text: string) {}

  *[Symbol.iterator](): Iterator<Token> {
    let previous: TokenKind | null = null
    for (const token of this.scan()) {
      if (token.kind === 'newline' && (previous === null || previous === 'newline')) continue
      previous = token.kind
      yield token
    }
  }

  private *scan(): Generator<Token> {
    const text = this.text
    let i = 0
    let line = 1
    let column = 1

    const make = (kind: TokenKind, value: string, atLine: number, atColumn: number): Token =>
      ({ kind, text: value, line: atLine, column: atColumn })

    while (i < text.length) {
      const ch = text[i]
      const next = text[i + 1]

      if (ch === '\n') {
        yield make('newline', '\n', line, column)
        i++
        line++
        column = 1
        continue
      }

      if (ch === ' ' || ch === '\t' || ch === '\r') {
        i++
        column++
        continue
      }

      if (ch === '/' && next === '/') {
        while (i < text.length && text[i] !== '\n') {
          i++
          column++
        }
        continue
      }

      const startLine = line
      const startColumn = column

      if (ch === '"' || ch === "'") {
        let value = ''
        let j = i + 1
        let closed = false
        while (j < text.length && text[j] !== '\n') {
          const c = text[j]
          if (c === '\\' && j + 1 < text.length && text[j + 1] !== '\n') {
            const escaped = text[j + 1]
            value += ESCAPES[escaped] ?? escaped
            j += 2
            continue
          }
          if (c === ch) {
            closed = true
            break
          }
          value += c
          j++
        }
        if (!closed) {
          throw new LexError('Unterminated string literal', startLine, startColumn)
        }
        column += j + 1 - i
        i = j + 1
        yield make('string', value, startLine, startColumn)
        continue
      }

      if (ch === '/' || (ch === '@' && next === '/')) {
        let j = i
        while (j < text.length && !/[\s{}]/.test(text[j]) && !(text[j] === '/' && text[j + 1] === '/' && j > i)) {
          j++
        }
        const value = text.slice(i, j)
        column += j - i
        i = j
        yield make('path', value, startLine, startColumn)
        continue
      }

      if (WORD_START.test(ch)) {
        let j = i
        while (j < text.length && WORD_CHAR.test(text[j]) && !(text[j] === '/' && text[j + 1] === '/')) {
          j++
        }
        const value = text.slice(i, j)
        column += j - i
        i = j
        yield make(NUMBER.test(value) ? 'number' : 'word', value, startLine, startColumn)
        continue
      }

      const kind: TokenKind | undefined = PUNCTUATION[ch]
      if (kind === undefined) {
        throw new LexError(`Unexpected character '${ch}'`, startLine, startColumn)
      }
      i++
      column++
      yield make(kind, ch, startLine, startColumn)
    }

    yield make('eof', '', line, column)
  }
}

export function tokenize(text: string): Token[] {
  return [...new Lexer(text)]
}
