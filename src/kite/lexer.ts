// Kite lexer: JavaScript source text to tokens.
// © Reuben Thomas 2023-2025
// Released under the MIT license.

import * as ohm from 'ohm-js'
import type {Node} from 'ohm-js'

import {KiteLexError, SourceLoc} from './error.js'

// Only lexical rules, so ohm does no implicit whitespace skipping. Every
// input matches: malformed literals have their own cases, which raise
// KiteLexError when the token is built.
const grammar = ohm.grammar(String.raw`
Kite {
  tokens = item* end
  item = whitespace | comment | token

  whitespace = ("\t" | "\n" | "\r" | " " | "\x0b" | "\x0c" | "\xa0" | "\ufeff" | "\u2028" | "\u2029")+
  lineEnd = "\n" | "\r" | "\u2028" | "\u2029"
  comment = "//" (~lineEnd any)*  -- line
          | "/*" (~"*/" any)* "*/"  -- block
          | "/*" (~"*/" any)*  -- unterminated

  token = number | string | template | identifierName | punctuator | invalid

  number = "0" ("x" | "X") hexDigit+  -- hex
         | digit* "." digit+ exponent?  -- fraction
         | digit+ exponent?  -- integer
  exponent = ("e" | "E") ("+" | "-")? digit+

  string = "\"" doubleChar* "\""  -- double
         | "'" singleChar* "'"  -- single
         | "\"" doubleChar*  -- unterminatedDouble
         | "'" singleChar*  -- unterminatedSingle
  doubleChar = "\\" any  -- escape
             | ~("\"" | "\\" | lineEnd) any  -- plain
  singleChar = "\\" any  -- escape
             | ~("'" | "\\" | lineEnd) any  -- plain

  template = "\x60" templatePart* "\x60"  -- complete
           | "\x60" templatePart*  -- unterminated
  templatePart = "\x24{" substitution "}"  -- substitution
               | "\\" any  -- escape
               | ~("\x60" | "\x24{") any  -- char
  substitution = substitutionPart*
  substitutionPart = "{" substitution "}"  -- braced
                   | "\"" doubleChar* "\""  -- double
                   | "'" singleChar* "'"  -- single
                   | "\x60" templatePart* "\x60"  -- template
                   | ~"}" any  -- char

  identifierName = identifierStart identifierPart*
  identifierStart = letter | "$" | "_"
  identifierPart = identifierStart | digit

  punctuator = "===" | "!==" | "**=" | "..." | "=>" | "==" | "!=" | "<=" | ">="
             | "&&" | "||" | "??" | "++" | "--" | "+=" | "-=" | "*=" | "/=" | "%="
             | "**" | "{" | "}" | "(" | ")" | "[" | "]" | ";" | "," | "<" | ">"
             | "+" | "-" | "*" | "/" | "%" | "!" | "?" | ":" | "=" | "."

  invalid = any
}
`)

export const keywords = new Set([
  'await', 'break', 'case', 'catch', 'class', 'const', 'continue', 'default',
  'delete', 'do', 'else', 'export', 'extends', 'false', 'finally', 'for',
  'function', 'if', 'import', 'in', 'instanceof', 'let', 'new', 'null',
  'return', 'super', 'switch', 'this', 'throw', 'true', 'try', 'typeof',
  'var', 'void', 'while',
])

interface TokenBase {
  lexeme: string
  line: number
  column: number
  offset: number
  newlineBefore: boolean
}

export interface SimpleToken extends TokenBase {
  kind: 'identifier' | 'keyword' | 'punctuator' | 'eof'
}

export interface NumberToken extends TokenBase {
  kind: 'number'
  value: number
}

export interface StringToken extends TokenBase {
  kind: 'string'
  value: string
}

export interface TemplateSubstitution {
  source: string
  line: number
  column: number
  offset: number
}

export interface TemplateToken extends TokenBase {
  kind: 'template'
  quasis: string[]
  substitutions: TemplateSubstitution[]
}

export type Token = SimpleToken | NumberToken | StringToken | TemplateToken

export interface LexOptions {
  file?: string
  // Position of the first character, for re-lexing embedded source.
  line?: number
  column?: number
  offset?: number
}

interface Lexeme {
  token?: Token
  newline: boolean
}

const lineEndRegExp = /[\n\r\u2028\u2029]/

const singleEscapes = new Map([
  ['n', '\n'], ['t', '\t'], ['r', '\r'], ['b', '\b'], ['f', '\f'], ['v', '\v'], ['0', '\0'],
])

// Translate escape sequences in the body of a string or template chunk.
function cook(raw: string, fail: (message: string) => never): string {
  let result = ''
  for (let i = 0; i < raw.length; i += 1) {
    const c = raw[i]
    if (c !== '\\') {
      result += c
      continue
    }
    i += 1
    const e = raw[i]
    const simple = singleEscapes.get(e)
    if (simple !== undefined && !(e === '0' && /[0-9]/.test(raw[i + 1] ?? ''))) {
      result += simple
    } else if (e === 'x') {
      const hex = raw.slice(i + 1, i + 3)
      if (!/^[0-9a-fA-F]{2}$/.test(hex)) {
        fail('Invalid hexadecimal escape sequence')
      }
      result += String.fromCharCode(parseInt(hex, 16))
      i += 2
    } else if (e === 'u') {
      if (raw[i + 1] === '{') {
        const close = raw.indexOf('}', i)
        const hex = raw.slice(i + 2, close)
        if (close < 0 || !/^[0-9a-fA-F]+$/.test(hex) || parseInt(hex, 16) > 0x10ffff) {
          fail('Invalid Unicode escape sequence')
        }
        result += String.fromCodePoint(parseInt(hex, 16))
        i = close
      } else {
        const hex = raw.slice(i + 1, i + 5)
        if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
          fail('Invalid Unicode escape sequence')
        }
        result += String.fromCharCode(parseInt(hex, 16))
        i += 4
      }
    } else if (e === '\r') {
      // Line continuation, possibly CRLF.
      if (raw[i + 1] === '\n') {
        i += 1
      }
    } else if (e === '\n' || e === '\u2028' || e === '\u2029') {
      // Line continuation.
    } else {
      result += e
    }
  }
  return result
}

export function tokenize(source: string, options: LexOptions = {}): Token[] {
  const file = options.file ?? '<input>'
  const baseLine = options.line ?? 1
  const baseColumn = options.column ?? 1
  const baseOffset = options.offset ?? 0

  function locate(node: Node) {
    const {lineNum, colNum} = node.source.getLineAndColumn()
    return {
      line: lineNum + baseLine - 1,
      column: lineNum === 1 ? colNum + baseColumn - 1 : colNum,
      offset: node.source.startIdx + baseOffset,
    }
  }

  function fail(node: Node, message: string): never {
    const {line, column} = locate(node)
    throw new KiteLexError(message, new SourceLoc(line, column), file)
  }

  const semantics = grammar.createSemantics()
  semantics.addOperation<Lexeme[] | Lexeme>('lex', {
    tokens(items: Node, _end: Node) {
      return items.children.map((item: Node) => item.lex() as Lexeme)
    },

    whitespace(_chars: Node) {
      return {newline: lineEndRegExp.test(this.sourceString)}
    },

    comment(c: Node) {
      if (c.ctorName === 'comment_unterminated') {
        fail(this, 'Unterminated comment')
      }
      return {newline: c.ctorName === 'comment_block' && lineEndRegExp.test(this.sourceString)}
    },

    number(_n: Node) {
      return {
        token: {kind: 'number', lexeme: this.sourceString, value: Number(this.sourceString), ...locate(this), newlineBefore: false},
        newline: false,
      }
    },

    string(s: Node) {
      if (s.ctorName === 'string_unterminatedDouble' || s.ctorName === 'string_unterminatedSingle') {
        fail(this, 'Unterminated string literal')
      }
      const value = cook(this.sourceString.slice(1, -1), (message) => fail(this, message))
      return {
        token: {kind: 'string', lexeme: this.sourceString, value, ...locate(this), newlineBefore: false},
        newline: false,
      }
    },

    template(t: Node) {
      if (t.ctorName === 'template_unterminated') {
        fail(this, 'Unterminated template literal')
      }
      const quasis: string[] = []
      const substitutions: TemplateSubstitution[] = []
      let raw = ''
      for (const part of t.children[1].children) {
        const alt: Node = part.children[0]
        if (alt.ctorName === 'templatePart_substitution') {
          quasis.push(cook(raw, (message) => fail(this, message)))
          raw = ''
          const body: Node = alt.children[1]
          substitutions.push({source: body.sourceString, ...locate(body)})
        } else {
          raw += alt.sourceString
        }
      }
      quasis.push(cook(raw, (message) => fail(this, message)))
      return {
        token: {kind: 'template', lexeme: this.sourceString, quasis, substitutions, ...locate(this), newlineBefore: false},
        newline: false,
      }
    },

    identifierName(_start: Node, _rest: Node) {
      const kind = keywords.has(this.sourceString) ? 'keyword' : 'identifier'
      return {
        token: {kind, lexeme: this.sourceString, ...locate(this), newlineBefore: false},
        newline: false,
      }
    },

    punctuator(_p: Node) {
      return {
        token: {kind: 'punctuator', lexeme: this.sourceString, ...locate(this), newlineBefore: false},
        newline: false,
      }
    },

    invalid(_c: Node) {
      return fail(this, `Invalid or unexpected token '${this.sourceString}'`)
    },
  })

  const matchResult = grammar.match(source, 'tokens')
  if (matchResult.failed()) {
    // The grammar accepts every input, so this is an engine fault.
    throw new KiteLexError(matchResult.message ?? 'Lexer failure', undefined, file)
  }
  const lexemes: Lexeme[] = semantics(matchResult).lex()
  const tokens: Token[] = []
  let newline = false
  for (const lexeme of lexemes) {
    if (lexeme.token === undefined) {
      newline ||= lexeme.newline
    } else {
      lexeme.token.newlineBefore = newline
      tokens.push(lexeme.token)
      newline = false
    }
  }
  const end = endPosition(source, baseLine, baseColumn)
  tokens.push({
    kind: 'eof', lexeme: '', line: end.line, column: end.column, offset: source.length + baseOffset, newlineBefore: newline,
  })
  return tokens
}

function endPosition(source: string, baseLine: number, baseColumn: number) {
  const lines = source.split(/\r\n|[\n\r\u2028\u2029]/)
  const last = lines[lines.length - 1]
  return lines.length === 1
    ? {line: baseLine, column: baseColumn + last.length}
    : {line: baseLine + lines.length - 1, column: last.length + 1}
}
