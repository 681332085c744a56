// Kite parser: tokens to AST.
// © Reuben Thomas 2023-2025
// Released under the MIT license.

import {
  AccessorKind, ArrayLiteral, ArrayPattern, Assign, AssignOp, Await, Binary, BinaryOp, Block,
  Break, Call, ClassDecl, ClassExp, ClassMember, Conditional, Continue, DeclKind,
  DoWhile, Empty, Exp, ExportDecl, ExportDefault, ExportNames, ExportSpecifier,
  ExpStatement, For, ForIn, ForOf, FunctionDecl, FunctionExp, FunctionKind,
  Identifier, If, Import, ImportSpecifier, Literal, Logical, LogicalOp, Member,
  New, ObjectLiteral, ObjectPattern, Pattern, PatternElement, PatternProperty,
  Program, Property, Return, Sequence, Spread, Statement, SuperCall, SuperProperty, Switch,
  SwitchCase, TemplateLiteral, ThisExp, Throw, Try, Unary, UnaryOp, Update,
  VarDecl, While, boundNames, inferName,
} from './ast.js'
import {KiteParseError, SourceLoc} from './error.js'
import {Token, TemplateToken, tokenize} from './lexer.js'

export interface ParseOptions {
  file?: string
  // Allow import and export declarations at top level.
  module?: boolean
}

const logicalOps = new Map<string, [number, LogicalOp]>([
  ['??', [1, '??']],
  ['||', [2, '||']],
  ['&&', [3, '&&']],
])

const binaryOps = new Map<string, [number, BinaryOp]>([
  ['==', [4, '==']], ['!=', [4, '!=']], ['===', [4, '===']], ['!==', [4, '!==']],
  ['<', [5, '<']], ['>', [5, '>']], ['<=', [5, '<=']], ['>=', [5, '>=']],
  ['instanceof', [5, 'instanceof']], ['in', [5, 'in']],
  ['+', [6, '+']], ['-', [6, '-']],
  ['*', [7, '*']], ['/', [7, '/']], ['%', [7, '%']],
])

const assignOps = new Map<string, AssignOp>([
  ['=', '='], ['+=', '+='], ['-=', '-='], ['*=', '*='], ['/=', '/='], ['%=', '%='], ['**=', '**='],
])

const unaryOps = new Map<string, UnaryOp>([
  ['!', '!'], ['-', '-'], ['+', '+'], ['typeof', 'typeof'], ['void', 'void'], ['delete', 'delete'],
])

const declKinds = new Map<string, DeclKind>([['var', 'var'], ['let', 'let'], ['const', 'const']])

class FunctionContext {
  loopDepth = 0

  switchDepth = 0

  constructor(
    public isAsync: boolean,
    public allowSuperProperty: boolean,
    public allowSuperCall: boolean,
    public isFunction: boolean,
  ) {}
}

// Declared names in one block or function scope, for duplicate detection.
class DeclScope {
  lexical = new Set<string>()

  vars = new Set<string>()

  constructor(public isFunction: boolean) {}
}

class Parser {
  private pos = 0

  private fn: FunctionContext

  private scopes: DeclScope[] = [new DeclScope(true)]

  private noIn = false

  constructor(
    private tokens: Token[],
    private file: string,
    private isModule: boolean,
  ) {
    this.fn = new FunctionContext(false, false, false, false)
  }

  // Token access.

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)]
  }

  private next(): Token {
    const tok = this.peek()
    if (this.pos < this.tokens.length - 1) {
      this.pos += 1
    }
    return tok
  }

  private at(lexeme: string, offset = 0) {
    const tok = this.peek(offset)
    return (tok.kind === 'punctuator' || tok.kind === 'keyword') && tok.lexeme === lexeme
  }

  private atContextual(name: string, offset = 0) {
    const tok = this.peek(offset)
    return tok.kind === 'identifier' && tok.lexeme === name
  }

  // `get` or `set` before a property name starts an accessor.
  private atAccessor(): AccessorKind | undefined {
    const tok = this.peek()
    if (tok.kind !== 'identifier' || (tok.lexeme !== 'get' && tok.lexeme !== 'set')) {
      return undefined
    }
    const next = this.peek(1)
    const startsKey = next.kind === 'identifier' || next.kind === 'keyword' || next.kind === 'string'
      || next.kind === 'number' || this.at('[', 1)
    if (!startsKey) {
      return undefined
    }
    return tok.lexeme === 'get' ? 'get' : 'set'
  }

  private parseAccessor(kind: AccessorKind, keyTok: Token, name: string | undefined): FunctionExp {
    const fn = this.parseFunctionRest(this.loc(keyTok), name, 'method', false)
    if (kind === 'get' && (fn.params.length !== 0 || fn.restParam !== undefined)) {
      this.error('Getter must not have any formal parameters.', keyTok)
    } else if (kind === 'set' && (fn.params.length !== 1 || fn.restParam !== undefined)) {
      this.error('Setter must have exactly one formal parameter.', keyTok)
    }
    return fn
  }

  private eat(lexeme: string) {
    if (this.at(lexeme)) {
      this.next()
      return true
    }
    return false
  }

  private loc(tok: Token = this.peek()) {
    return new SourceLoc(tok.line, tok.column)
  }

  private error(message: string, tok: Token = this.peek()): never {
    throw new KiteParseError(message, this.loc(tok), this.file)
  }

  private describe(tok: Token) {
    return tok.kind === 'eof' ? 'end of input' : `'${tok.lexeme}'`
  }

  private expected(what: string): never {
    const tok = this.peek()
    return this.error(`Expected ${what} but found ${this.describe(tok)}`, tok)
  }

  private expect(lexeme: string) {
    if (!this.at(lexeme)) {
      this.expected(`'${lexeme}'`)
    }
    return this.next()
  }

  private identifier(what = 'identifier'): string {
    const tok = this.peek()
    if (tok.kind !== 'identifier') {
      this.expected(what)
    }
    this.next()
    return tok.lexeme
  }

  // Property names may be reserved words.
  private identifierName(): string {
    const tok = this.peek()
    if (tok.kind !== 'identifier' && tok.kind !== 'keyword') {
      this.expected('property name')
    }
    this.next()
    return tok.lexeme
  }

  private consumeSemicolon() {
    if (this.eat(';')) {
      return
    }
    const tok = this.peek()
    if (this.at('}') || tok.kind === 'eof' || tok.newlineBefore) {
      return
    }
    this.expected("';'")
  }

  // Scope tracking.

  private withScope<T>(isFunction: boolean, f: () => T): T {
    this.scopes.push(new DeclScope(isFunction))
    try {
      return f()
    } finally {
      this.scopes.pop()
    }
  }

  private declareLexical(name: string, tok: Token) {
    const scope = this.scopes[this.scopes.length - 1]
    if (scope.lexical.has(name) || scope.vars.has(name)) {
      this.error(`Identifier '${name}' has already been declared`, tok)
    }
    scope.lexical.add(name)
  }

  private declareVar(name: string, tok: Token) {
    for (let i = this.scopes.length - 1; i >= 0; i -= 1) {
      const scope = this.scopes[i]
      if (scope.lexical.has(name)) {
        this.error(`Identifier '${name}' has already been declared`, tok)
      }
      scope.vars.add(name)
      if (scope.isFunction) {
        break
      }
    }
  }

  private declare(kind: DeclKind, pattern: Pattern, tok: Token) {
    for (const name of boundNames(pattern)) {
      if (kind === 'var') {
        this.declareVar(name, tok)
      } else {
        this.declareLexical(name, tok)
      }
    }
  }

  private declareFunction(name: string, tok: Token) {
    if (this.scopes[this.scopes.length - 1].isFunction) {
      this.declareVar(name, tok)
    } else {
      this.declareLexical(name, tok)
    }
  }

  // Program and statements.

  parseProgram(): Program {
    const start = this.peek()
    const body: Statement[] = []
    while (this.peek().kind !== 'eof') {
      body.push(this.parseStatementListItem(true))
    }
    return new Program(this.loc(start), body, this.file)
  }

  private parseStatementListItem(topLevel = false): Statement {
    if (this.at('import') && !this.at('(', 1)) {
      if (!topLevel || !this.isModule) {
        this.error("Cannot use import statement outside a module's top level")
      }
      return this.parseImport()
    } else if (this.at('export')) {
      if (!topLevel || !this.isModule) {
        this.error("Cannot use export statement outside a module's top level")
      }
      return this.parseExport()
    } else if (this.at('function')) {
      return this.parseFunctionDeclaration(false)
    } else if (this.atContextual('async') && this.at('function', 1) && !this.peek(1).newlineBefore) {
      this.next()
      return this.parseFunctionDeclaration(true)
    } else if (this.at('class')) {
      return this.parseClassDeclaration()
    } else if (this.at('let') || this.at('const')) {
      const decl = this.parseVarDecl()
      this.consumeSemicolon()
      return decl
    }
    return this.parseStatement()
  }

  private parseStatement(): Statement {
    const tok = this.peek()
    const loc = this.loc(tok)
    if (this.at('{')) {
      return this.withScope(false, () => this.parseBlock())
    } else if (this.at(';')) {
      this.next()
      return new Empty(loc)
    } else if (this.at('var')) {
      const decl = this.parseVarDecl()
      this.consumeSemicolon()
      return decl
    } else if (this.eat('if')) {
      this.expect('(')
      const test = this.parseExpression()
      this.expect(')')
      const consequent = this.parseSubStatement()
      const alternate = this.eat('else') ? this.parseSubStatement() : undefined
      return new If(loc, test, consequent, alternate)
    } else if (this.eat('while')) {
      this.expect('(')
      const test = this.parseExpression()
      this.expect(')')
      return new While(loc, test, this.parseLoopBody())
    } else if (this.eat('do')) {
      const body = this.parseLoopBody()
      this.expect('while')
      this.expect('(')
      const test = this.parseExpression()
      this.expect(')')
      this.eat(';')
      return new DoWhile(loc, body, test)
    } else if (this.at('for')) {
      return this.withScope(false, () => this.parseFor())
    } else if (this.at('switch')) {
      return this.parseSwitch()
    } else if (this.at('try')) {
      return this.parseTry()
    } else if (this.eat('return')) {
      if (!this.fn.isFunction) {
        this.error('Illegal return statement', tok)
      }
      let argument: Exp | undefined
      const after = this.peek()
      if (!this.at(';') && !this.at('}') && after.kind !== 'eof' && !after.newlineBefore) {
        argument = this.parseExpression()
      }
      this.consumeSemicolon()
      return new Return(loc, argument)
    } else if (this.eat('break')) {
      if (this.fn.loopDepth === 0 && this.fn.switchDepth === 0) {
        this.error('Illegal break statement', tok)
      }
      this.consumeSemicolon()
      return new Break(loc)
    } else if (this.eat('continue')) {
      if (this.fn.loopDepth === 0) {
        this.error('Illegal continue statement: no surrounding iteration statement', tok)
      }
      this.consumeSemicolon()
      return new Continue(loc)
    } else if (this.eat('throw')) {
      if (this.peek().newlineBefore) {
        this.error('Illegal newline after throw')
      }
      const argument = this.parseExpression()
      this.consumeSemicolon()
      return new Throw(loc, argument)
    } else if (this.at('function') || this.at('class') || this.at('let') || this.at('const')) {
      return this.parseStatementListItem()
    }
    const exp = this.parseExpression()
    this.consumeSemicolon()
    return new ExpStatement(loc, exp)
  }

  // The body of an if or loop gets its own declaration scope.
  private parseSubStatement(): Statement {
    return this.withScope(false, () => this.parseStatement())
  }

  private parseLoopBody(): Statement {
    this.fn.loopDepth += 1
    try {
      return this.parseSubStatement()
    } finally {
      this.fn.loopDepth -= 1
    }
  }

  private parseBlock(): Block {
    const loc = this.loc()
    this.expect('{')
    const body: Statement[] = []
    while (!this.at('}')) {
      if (this.peek().kind === 'eof') {
        this.expected("'}'")
      }
      body.push(this.parseStatementListItem())
    }
    this.next()
    return new Block(loc, body)
  }

  private declKind(): DeclKind {
    const kind = declKinds.get(this.peek().lexeme)
    if (kind === undefined) {
      return this.expected("'var', 'let' or 'const'")
    }
    this.next()
    return kind
  }

  private parseVarDecl(): VarDecl {
    const tok = this.peek()
    const kind = this.declKind()
    const declarations: PatternElement[] = []
    do {
      const targetTok = this.peek()
      const target = this.parseBindingTarget()
      this.declare(kind, target, targetTok)
      let init: Exp | undefined
      if (this.eat('=')) {
        init = this.parseAssignment()
      } else if (kind === 'const' && !this.atContextual('of') && !this.at('in')) {
        this.error('Missing initializer in const declaration')
      } else if (!(target instanceof Identifier) && !this.atContextual('of') && !this.at('in')) {
        this.error('Missing initializer in destructuring declaration')
      }
      if (target instanceof Identifier) {
        inferName(init, target.name)
      }
      declarations.push({target, init})
    } while (this.eat(','))
    return new VarDecl(this.loc(tok), kind, declarations)
  }

  private parseFor(): Statement {
    const loc = this.loc()
    this.expect('for')
    this.expect('(')
    let init: VarDecl | Exp | undefined
    if (this.at('var') || this.at('let') || this.at('const')) {
      const declTok = this.peek()
      const kind = this.declKind()
      const targetTok = this.peek()
      const target = this.parseBindingTarget()
      if (this.atContextual('of') || this.at('in')) {
        this.declare(kind, target, targetTok)
        return this.parseForInOf(loc, new VarDecl(this.loc(declTok), kind, [{target}]))
      }
      const declarations: PatternElement[] = []
      let first = true
      do {
        const nameTok = first ? targetTok : this.peek()
        const pattern = first ? target : this.parseBindingTarget()
        first = false
        this.declare(kind, pattern, nameTok)
        let value: Exp | undefined
        if (this.eat('=')) {
          value = this.withNoIn(() => this.parseAssignment())
        } else if (kind === 'const') {
          this.error('Missing initializer in const declaration')
        }
        if (pattern instanceof Identifier) {
          inferName(value, pattern.name)
        }
        declarations.push({target: pattern, init: value})
      } while (this.eat(','))
      init = new VarDecl(this.loc(declTok), kind, declarations)
    } else if (!this.at(';')) {
      const startTok = this.peek()
      const exp = this.withNoIn(() => this.parseExpression())
      if (this.atContextual('of') || this.at('in')) {
        return this.parseForInOf(loc, this.toPattern(exp, startTok))
      }
      init = exp
    }
    this.expect(';')
    const test = this.at(';') ? undefined : this.parseExpression()
    this.expect(';')
    const update = this.at(')') ? undefined : this.parseExpression()
    this.expect(')')
    return new For(loc, init, test, update, this.parseLoopBody())
  }

  private parseForInOf(loc: SourceLoc, left: VarDecl | Pattern): Statement {
    const isOf = this.atContextual('of')
    this.next()
    const right = isOf ? this.parseAssignment() : this.parseExpression()
    this.expect(')')
    const body = this.parseLoopBody()
    return isOf ? new ForOf(loc, left, right, body) : new ForIn(loc, left, right, body)
  }

  private withNoIn<T>(f: () => T): T {
    const saved = this.noIn
    this.noIn = true
    try {
      return f()
    } finally {
      this.noIn = saved
    }
  }

  private withIn<T>(f: () => T): T {
    const saved = this.noIn
    this.noIn = false
    try {
      return f()
    } finally {
      this.noIn = saved
    }
  }

  private parseSwitch(): Statement {
    const loc = this.loc()
    this.expect('switch')
    this.expect('(')
    const discriminant = this.parseExpression()
    this.expect(')')
    this.expect('{')
    const cases: SwitchCase[] = []
    let seenDefault = false
    this.fn.switchDepth += 1
    try {
      this.withScope(false, () => {
        while (!this.eat('}')) {
          const caseTok = this.peek()
          let test: Exp | undefined
          if (this.eat('case')) {
            test = this.parseExpression()
          } else if (this.eat('default')) {
            if (seenDefault) {
              this.error('More than one default clause in switch statement', caseTok)
            }
            seenDefault = true
          } else {
            this.expected("'case', 'default' or '}'")
          }
          this.expect(':')
          const body: Statement[] = []
          while (!this.at('case') && !this.at('default') && !this.at('}')) {
            if (this.peek().kind === 'eof') {
              this.expected("'}'")
            }
            body.push(this.parseStatementListItem())
          }
          cases.push(new SwitchCase(this.loc(caseTok), test, body))
        }
      })
    } finally {
      this.fn.switchDepth -= 1
    }
    return new Switch(loc, discriminant, cases)
  }

  private parseTry(): Statement {
    const loc = this.loc()
    this.expect('try')
    const block = this.withScope(false, () => this.parseBlock())
    let param: Pattern | undefined
    let handler: Block | undefined
    let finalizer: Block | undefined
    if (this.eat('catch')) {
      handler = this.withScope(false, () => {
        if (this.eat('(')) {
          const paramTok = this.peek()
          param = this.parseBindingTarget()
          this.declare('let', param, paramTok)
          this.expect(')')
        }
        // The catch parameter and the block's own declarations share a scope.
        const blockLoc = this.loc()
        this.expect('{')
        const body: Statement[] = []
        while (!this.eat('}')) {
          if (this.peek().kind === 'eof') {
            this.expected("'}'")
          }
          body.push(this.parseStatementListItem())
        }
        return new Block(blockLoc, body)
      })
    }
    if (this.eat('finally')) {
      finalizer = this.withScope(false, () => this.parseBlock())
    }
    if (handler === undefined && finalizer === undefined) {
      this.expected("'catch' or 'finally'")
    }
    return new Try(loc, block, param, handler, finalizer)
  }

  private parseFunctionDeclaration(isAsync: boolean): FunctionDecl {
    const loc = this.loc()
    this.expect('function')
    const nameTok = this.peek()
    const name = this.identifier('function name')
    this.declareFunction(name, nameTok)
    const fn = this.parseFunctionRest(loc, name, 'normal', isAsync)
    return new FunctionDecl(loc, name, fn)
  }

  private parseClassDeclaration(): ClassDecl {
    const loc = this.loc()
    this.expect('class')
    const nameTok = this.peek()
    const name = this.identifier('class name')
    this.declareLexical(name, nameTok)
    return new ClassDecl(loc, name, this.parseClassRest(loc, name))
  }

  private parseImport(): Statement {
    const loc = this.loc()
    this.expect('import')
    let defaultName: string | undefined
    let namespaceName: string | undefined
    const specifiers: ImportSpecifier[] = []
    const bind = (name: string, tok: Token) => this.declareLexical(name, tok)
    if (this.peek().kind !== 'string') {
      if (this.peek().kind === 'identifier') {
        const tok = this.peek()
        defaultName = this.identifier()
        bind(defaultName, tok)
        if (!this.eat(',')) {
          return this.parseImportFrom(loc, defaultName, namespaceName, specifiers)
        }
      }
      if (this.eat('*')) {
        if (!this.atContextual('as')) {
          this.expected("'as'")
        }
        this.next()
        const tok = this.peek()
        namespaceName = this.identifier()
        bind(namespaceName, tok)
      } else {
        this.expect('{')
        while (!this.eat('}')) {
          const imported = this.identifierName()
          let local = imported
          const tok = this.peek()
          if (this.atContextual('as')) {
            this.next()
            local = this.identifier()
          }
          bind(local, tok)
          specifiers.push({imported, local})
          if (!this.at('}')) {
            this.expect(',')
          }
        }
      }
    }
    return this.parseImportFrom(loc, defaultName, namespaceName, specifiers)
  }

  private parseImportFrom(
    loc: SourceLoc,
    defaultName: string | undefined,
    namespaceName: string | undefined,
    specifiers: ImportSpecifier[],
  ): Statement {
    if (defaultName !== undefined || namespaceName !== undefined || specifiers.length > 0) {
      if (!this.atContextual('from')) {
        this.expected("'from'")
      }
      this.next()
    }
    const sourceTok = this.peek()
    if (sourceTok.kind !== 'string') {
      this.expected('module specifier')
    }
    this.next()
    this.consumeSemicolon()
    return new Import(loc, sourceTok.value, defaultName, namespaceName, specifiers)
  }

  private parseExport(): Statement {
    const loc = this.loc()
    this.expect('export')
    if (this.eat('default')) {
      let value: Exp | FunctionDecl | ClassDecl
      const isAsyncFn = this.atContextual('async') && this.at('function', 1)
      if ((this.at('function') || isAsyncFn) && this.peek(isAsyncFn ? 2 : 1).kind === 'identifier') {
        if (isAsyncFn) {
          this.next()
        }
        value = this.parseFunctionDeclaration(isAsyncFn)
      } else if (this.at('class') && this.peek(1).kind === 'identifier') {
        value = this.parseClassDeclaration()
      } else {
        value = this.parseAssignment()
        inferName(value, 'default')
        this.consumeSemicolon()
      }
      return new ExportDefault(loc, value)
    } else if (this.eat('{')) {
      const specifiers: ExportSpecifier[] = []
      while (!this.eat('}')) {
        const local = this.identifier()
        let exported = local
        if (this.atContextual('as')) {
          this.next()
          exported = this.identifierName()
        }
        specifiers.push({local, exported})
        if (!this.at('}')) {
          this.expect(',')
        }
      }
      this.consumeSemicolon()
      return new ExportNames(loc, specifiers)
    } else if (this.at('var') || this.at('let') || this.at('const')) {
      const decl = this.parseVarDecl()
      this.consumeSemicolon()
      return new ExportDecl(loc, decl)
    } else if (this.at('function')) {
      return new ExportDecl(loc, this.parseFunctionDeclaration(false))
    } else if (this.atContextual('async') && this.at('function', 1)) {
      this.next()
      return new ExportDecl(loc, this.parseFunctionDeclaration(true))
    } else if (this.at('class')) {
      return new ExportDecl(loc, this.parseClassDeclaration())
    }
    return this.expected('declaration or export list')
  }

  // Patterns.

  private parseBindingTarget(): Pattern {
    const tok = this.peek()
    const loc = this.loc(tok)
    if (this.eat('[')) {
      const elements: (PatternElement | null)[] = []
      let rest: Pattern | undefined
      while (!this.eat(']')) {
        if (this.eat(',')) {
          elements.push(null)
          continue
        }
        if (this.eat('...')) {
          rest = this.parseBindingTarget()
          this.expect(']')
          break
        }
        elements.push(this.parseBindingElement())
        if (!this.at(']')) {
          this.expect(',')
        }
      }
      return new ArrayPattern(loc, elements, rest)
    } else if (this.eat('{')) {
      const properties: PatternProperty[] = []
      let rest: Pattern | undefined
      while (!this.eat('}')) {
        if (this.eat('...')) {
          const restLoc = this.loc()
          rest = new Identifier(restLoc, this.identifier())
          this.expect('}')
          break
        }
        const propTok = this.peek()
        const {key, computed} = this.parsePropertyKey()
        let value: PatternElement
        if (this.eat(':')) {
          value = this.parseBindingElement()
        } else {
          if (computed || propTok.kind !== 'identifier') {
            this.expected("':'")
          }
          const target = new Identifier(this.loc(propTok), propTok.lexeme)
          value = {target, init: this.eat('=') ? this.parseAssignment() : undefined}
          inferName(value.init, target.name)
        }
        properties.push(new PatternProperty(this.loc(propTok), key, computed, value))
        if (!this.at('}')) {
          this.expect(',')
        }
      }
      return new ObjectPattern(loc, properties, rest)
    }
    return new Identifier(loc, this.identifier('binding name'))
  }

  private parseBindingElement(): PatternElement {
    const target = this.parseBindingTarget()
    const init = this.eat('=') ? this.withIn(() => this.parseAssignment()) : undefined
    if (target instanceof Identifier) {
      inferName(init, target.name)
    }
    return {target, init}
  }

  // Reinterpret an expression as an assignment target.
  private toPattern(exp: Exp, tok: Token): Pattern {
    if (exp instanceof Identifier || exp instanceof Member) {
      return exp
    } else if (exp instanceof ArrayLiteral) {
      const elements: (PatternElement | null)[] = []
      let rest: Pattern | undefined
      exp.elements.forEach((element, index) => {
        if (element === null) {
          elements.push(null)
        } else if (element instanceof Spread) {
          if (index !== exp.elements.length - 1) {
            this.error('Rest element must be last element', tok)
          }
          rest = this.toPattern(element.argument, tok)
        } else {
          elements.push(this.toPatternElement(element, tok))
        }
      })
      return new ArrayPattern(exp.loc, elements, rest)
    } else if (exp instanceof ObjectLiteral) {
      const properties: PatternProperty[] = []
      let rest: Pattern | undefined
      exp.properties.forEach((prop, index) => {
        if (prop instanceof Spread) {
          if (index !== exp.properties.length - 1) {
            this.error('Rest element must be last element', tok)
          }
          rest = this.toPattern(prop.argument, tok)
        } else {
          properties.push(new PatternProperty(prop.loc, prop.key, prop.computed, this.toPatternElement(prop.value, tok)))
        }
      })
      return new ObjectPattern(exp.loc, properties, rest)
    }
    return this.error('Invalid left-hand side in assignment', tok)
  }

  private toPatternElement(exp: Exp, tok: Token): PatternElement {
    if (exp instanceof Assign && exp.op === '=') {
      return {target: exp.target, init: exp.value}
    }
    return {target: this.toPattern(exp, tok)}
  }

  // Expressions.

  parseExpression(): Exp {
    const loc = this.loc()
    const first = this.parseAssignment()
    if (!this.at(',')) {
      return first
    }
    const expressions = [first]
    while (this.eat(',')) {
      expressions.push(this.parseAssignment())
    }
    return new Sequence(loc, expressions)
  }

  private parseAssignment(): Exp {
    const tok = this.peek()
    const loc = this.loc(tok)
    const arrow = this.tryArrowFunction()
    if (arrow !== undefined) {
      return arrow
    }
    const left = this.parseConditional()
    const opTok = this.peek()
    const op = opTok.kind === 'punctuator' ? assignOps.get(opTok.lexeme) : undefined
    if (op !== undefined) {
      this.next()
      let target: Pattern
      if (op === '=') {
        target = this.toPattern(left, tok)
      } else if (left instanceof Identifier || left instanceof Member) {
        target = left
      } else {
        this.error('Invalid left-hand side in assignment', tok)
      }
      const value = this.parseAssignment()
      if (op === '=' && target instanceof Identifier) {
        inferName(value, target.name)
      }
      return new Assign(loc, op, target, value)
    }
    return left
  }

  // Index of the token after the bracket matching the one at `start`.
  private skipBalanced(start: number): number {
    let depth = 0
    for (let i = start; i < this.tokens.length; i += 1) {
      const tok = this.tokens[i]
      if (tok.kind === 'punctuator') {
        if (tok.lexeme === '(' || tok.lexeme === '[' || tok.lexeme === '{') {
          depth += 1
        } else if (tok.lexeme === ')' || tok.lexeme === ']' || tok.lexeme === '}') {
          depth -= 1
          if (depth === 0) {
            return i + 1
          }
        }
      } else if (tok.kind === 'eof') {
        return i
      }
    }
    return this.tokens.length - 1
  }

  private isArrowAt(offset: number) {
    const tok = this.peek(offset)
    if (tok.kind === 'identifier') {
      return this.at('=>', offset + 1) && !this.peek(offset + 1).newlineBefore
    }
    if (this.at('(', offset)) {
      const after = this.skipBalanced(this.pos + offset)
      const arrowTok = this.tokens[after]
      return arrowTok.kind === 'punctuator' && arrowTok.lexeme === '=>' && !arrowTok.newlineBefore
    }
    return false
  }

  private tryArrowFunction(): FunctionExp | undefined {
    const tok = this.peek()
    let isAsync = false
    if (this.atContextual('async') && !this.peek(1).newlineBefore && this.isArrowAt(1)) {
      isAsync = true
      this.next()
    } else if (!this.isArrowAt(0)) {
      return undefined
    }
    const loc = this.loc(tok)
    const saved = this.fn
    const context = new FunctionContext(isAsync, saved.allowSuperProperty, saved.allowSuperCall, true)
    this.fn = context
    try {
      return this.withScope(true, () => {
        let params: PatternElement[]
        let restParam: Pattern | undefined
        if (this.peek().kind === 'identifier') {
          const paramTok = this.peek()
          const target = new Identifier(this.loc(paramTok), this.identifier())
          this.declare('var', target, paramTok)
          params = [{target}]
        } else {
          [params, restParam] = this.parseParams()
        }
        this.expect('=>')
        let body: Block | Exp
        if (this.at('{')) {
          body = this.parseFunctionBody()
        } else {
          body = this.withIn(() => this.parseAssignment())
        }
        return new FunctionExp(loc, undefined, params, restParam, body, 'arrow', isAsync)
      })
    } finally {
      this.fn = saved
    }
  }

  private parseParams(): [PatternElement[], Pattern | undefined] {
    this.expect('(')
    const params: PatternElement[] = []
    let rest: Pattern | undefined
    while (!this.eat(')')) {
      const tok = this.peek()
      if (this.eat('...')) {
        rest = this.parseBindingTarget()
        this.declare('var', rest, tok)
        this.expect(')')
        break
      }
      const param = this.parseBindingElement()
      this.declare('var', param.target, tok)
      params.push(param)
      if (!this.at(')')) {
        this.expect(',')
      }
    }
    return [params, rest]
  }

  private parseFunctionBody(): Block {
    const loc = this.loc()
    this.expect('{')
    const body: Statement[] = []
    while (!this.eat('}')) {
      if (this.peek().kind === 'eof') {
        this.expected("'}'")
      }
      body.push(this.parseStatementListItem())
    }
    return new Block(loc, body)
  }

  // Parse parameters and body of a non-arrow function.
  private parseFunctionRest(
    loc: SourceLoc,
    name: string | undefined,
    kind: FunctionKind,
    isAsync: boolean,
    allowSuperCall = false,
  ): FunctionExp {
    const saved = this.fn
    const isMethod = kind === 'method' || kind === 'constructor'
    this.fn = new FunctionContext(isAsync, isMethod, allowSuperCall, true)
    const savedNoIn = this.noIn
    this.noIn = false
    try {
      return this.withScope(true, () => {
        const [params, restParam] = this.parseParams()
        const body = this.parseFunctionBody()
        return new FunctionExp(loc, name, params, restParam, body, kind, isAsync)
      })
    } finally {
      this.fn = saved
      this.noIn = savedNoIn
    }
  }

  private parseClassRest(loc: SourceLoc, name: string | undefined): ClassExp {
    let superClass: Exp | undefined
    if (this.eat('extends')) {
      superClass = this.parseLeftHandSide()
    }
    this.expect('{')
    let ctor: FunctionExp | undefined
    const members: ClassMember[] = []
    while (!this.eat('}')) {
      if (this.eat(';')) {
        continue
      }
      const memberTok = this.peek()
      let isStatic = false
      if (this.atContextual('static') && !this.at('(', 1)) {
        this.next()
        isStatic = true
      }
      let isAsync = false
      if (this.atContextual('async') && !this.at('(', 1) && !this.peek(1).newlineBefore) {
        this.next()
        isAsync = true
      }
      const accessor = isAsync ? undefined : this.atAccessor()
      if (accessor !== undefined) {
        this.next()
      }
      const keyTok = this.peek()
      const {key, computed} = this.parsePropertyKey()
      const isCtor = !isStatic && !computed && keyTok.lexeme === 'constructor' && keyTok.kind !== 'string'
      if (isCtor && accessor !== undefined) {
        this.error('Class constructor may not be an accessor', keyTok)
      } else if (accessor !== undefined) {
        const methodName = computed || !(key instanceof Literal) ? undefined : String(key.value)
        const fn = this.parseAccessor(accessor, keyTok, methodName)
        members.push(new ClassMember(this.loc(memberTok), key, computed, isStatic, fn, accessor))
      } else if (isCtor) {
        if (ctor !== undefined) {
          this.error('A class may only have one constructor', keyTok)
        }
        if (isAsync) {
          this.error('Class constructor may not be an async method', keyTok)
        }
        ctor = this.parseFunctionRest(this.loc(keyTok), name, 'constructor', false, superClass !== undefined)
      } else {
        const methodName = computed || !(key instanceof Literal) ? undefined : String(key.value)
        const fn = this.parseFunctionRest(this.loc(keyTok), methodName, 'method', isAsync)
        members.push(new ClassMember(this.loc(memberTok), key, computed, isStatic, fn))
      }
    }
    return new ClassExp(loc, name, superClass, ctor, members)
  }

  private parsePropertyKey(): {key: Exp, computed: boolean} {
    const tok = this.peek()
    const loc = this.loc(tok)
    if (this.eat('[')) {
      const key = this.withIn(() => this.parseAssignment())
      this.expect(']')
      return {key, computed: true}
    } else if (tok.kind === 'string') {
      this.next()
      return {key: new Literal(loc, tok.value), computed: false}
    } else if (tok.kind === 'number') {
      this.next()
      return {key: new Literal(loc, String(tok.value)), computed: false}
    } else if (tok.kind === 'identifier' || tok.kind === 'keyword') {
      this.next()
      return {key: new Literal(loc, tok.lexeme), computed: false}
    }
    return this.expected('property name')
  }

  private parseConditional(): Exp {
    const loc = this.loc()
    const test = this.parseBinary(1)
    if (this.eat('?')) {
      const consequent = this.withIn(() => this.parseAssignment())
      this.expect(':')
      const alternate = this.parseAssignment()
      return new Conditional(loc, test, consequent, alternate)
    }
    return test
  }

  private parseBinary(minPrec: number): Exp {
    const loc = this.loc()
    let left = this.parseExponent()
    for (;;) {
      const tok = this.peek()
      if (tok.kind !== 'punctuator' && tok.kind !== 'keyword') {
        break
      }
      const logical = logicalOps.get(tok.lexeme)
      const binary = binaryOps.get(tok.lexeme)
      const prec = logical?.[0] ?? binary?.[0]
      if (prec === undefined || prec < minPrec || (tok.lexeme === 'in' && this.noIn)) {
        break
      }
      this.next()
      const right = this.parseBinary(prec + 1)
      if (logical !== undefined) {
        left = new Logical(loc, logical[1], left, right)
      } else if (binary !== undefined) {
        left = new Binary(loc, binary[1], left, right)
      }
    }
    return left
  }

  private parseExponent(): Exp {
    const loc = this.loc()
    const left = this.parseUnary()
    if (this.eat('**')) {
      return new Binary(loc, '**', left, this.parseExponent())
    }
    return left
  }

  private parseUnary(): Exp {
    const tok = this.peek()
    const loc = this.loc(tok)
    const op = tok.kind === 'punctuator' || tok.kind === 'keyword' ? unaryOps.get(tok.lexeme) : undefined
    if (op !== undefined) {
      this.next()
      return new Unary(loc, op, this.parseUnary())
    } else if (this.at('await')) {
      if (!this.fn.isAsync) {
        this.error('await is only valid in async functions', tok)
      }
      this.next()
      return new Await(loc, this.parseUnary())
    } else if (this.at('++') || this.at('--')) {
      this.next()
      const targetTok = this.peek()
      const target = this.parseUnary()
      if (!(target instanceof Identifier || target instanceof Member)) {
        this.error('Invalid left-hand side expression in prefix operation', targetTok)
      }
      return new Update(loc, tok.lexeme === '++' ? '++' : '--', true, target)
    }
    return this.parsePostfix()
  }

  private parsePostfix(): Exp {
    const tok = this.peek()
    const exp = this.parseLeftHandSide()
    const opTok = this.peek()
    if ((this.at('++') || this.at('--')) && !opTok.newlineBefore) {
      if (!(exp instanceof Identifier || exp instanceof Member)) {
        this.error('Invalid left-hand side expression in postfix operation', tok)
      }
      this.next()
      return new Update(this.loc(tok), opTok.lexeme === '++' ? '++' : '--', false, exp)
    }
    return exp
  }

  private parseArguments(): Exp[] {
    this.expect('(')
    const args: Exp[] = []
    this.withIn(() => {
      while (!this.eat(')')) {
        const tok = this.peek()
        if (this.eat('...')) {
          args.push(new Spread(this.loc(tok), this.parseAssignment()))
        } else {
          args.push(this.parseAssignment())
        }
        if (!this.at(')')) {
          this.expect(',')
        }
      }
    })
    return args
  }

  private parseLeftHandSide(): Exp {
    const tok = this.peek()
    const loc = this.loc(tok)
    let exp: Exp
    if (this.at('new')) {
      exp = this.parseNew()
    } else if (this.at('super')) {
      exp = this.parseSuper()
    } else {
      exp = this.parsePrimary()
    }
    return this.parseCallTail(loc, exp, true)
  }

  private parseCallTail(loc: SourceLoc, start: Exp, allowCalls: boolean): Exp {
    let exp = start
    for (;;) {
      if (this.eat('.')) {
        const nameTok = this.peek()
        exp = new Member(loc, exp, new Literal(this.loc(nameTok), this.identifierName()), false)
      } else if (this.at('[')) {
        this.next()
        const property = this.withIn(() => this.parseExpression())
        this.expect(']')
        exp = new Member(loc, exp, property, true)
      } else if (allowCalls && this.at('(')) {
        exp = new Call(loc, exp, this.parseArguments())
      } else {
        return exp
      }
    }
  }

  private parseNew(): Exp {
    const loc = this.loc()
    this.expect('new')
    let callee: Exp
    if (this.at('new')) {
      callee = this.parseNew()
    } else {
      callee = this.parseCallTail(this.loc(), this.parsePrimary(), false)
    }
    const args = this.at('(') ? this.parseArguments() : []
    return new New(loc, callee, args)
  }

  private parseSuper(): Exp {
    const tok = this.next()
    const loc = this.loc(tok)
    if (this.at('(')) {
      if (!this.fn.allowSuperCall) {
        this.error("'super' keyword unexpected here", tok)
      }
      return new SuperCall(loc, this.parseArguments())
    }
    if (!this.fn.allowSuperProperty) {
      this.error("'super' keyword unexpected here", tok)
    }
    if (this.eat('.')) {
      const nameTok = this.peek()
      return new SuperProperty(loc, new Literal(this.loc(nameTok), this.identifierName()), false)
    }
    this.expect('[')
    const property = this.withIn(() => this.parseExpression())
    this.expect(']')
    return new SuperProperty(loc, property, true)
  }

  private parsePrimary(): Exp {
    const tok = this.peek()
    const loc = this.loc(tok)
    switch (tok.kind) {
      case 'number':
      case 'string':
        this.next()
        return new Literal(loc, tok.value)
      case 'template':
        this.next()
        return this.parseTemplate(tok)
      case 'identifier':
        if (tok.lexeme === 'async' && this.at('function', 1) && !this.peek(1).newlineBefore) {
          this.next()
          return this.parseFunctionExpression(true)
        }
        this.next()
        return new Identifier(loc, tok.lexeme)
      case 'keyword':
        switch (tok.lexeme) {
          case 'true':
            this.next()
            return new Literal(loc, true)
          case 'false':
            this.next()
            return new Literal(loc, false)
          case 'null':
            this.next()
            return new Literal(loc, null)
          case 'this':
            this.next()
            return new ThisExp(loc)
          case 'function':
            return this.parseFunctionExpression(false)
          case 'class': {
            this.next()
            const name = this.peek().kind === 'identifier' ? this.identifier() : undefined
            return this.parseClassRest(loc, name)
          }
          default:
            break
        }
        break
      case 'punctuator':
        if (tok.lexeme === '(') {
          this.next()
          const exp = this.withIn(() => this.parseExpression())
          this.expect(')')
          return exp
        } else if (tok.lexeme === '[') {
          return this.parseArrayLiteral()
        } else if (tok.lexeme === '{') {
          return this.parseObjectLiteral()
        }
        break
      default:
        break
    }
    return this.expected('expression')
  }

  private parseFunctionExpression(isAsync: boolean): Exp {
    const loc = this.loc()
    this.expect('function')
    const name = this.peek().kind === 'identifier' ? this.identifier() : undefined
    return this.parseFunctionRest(loc, name, 'normal', isAsync)
  }

  private parseTemplate(tok: TemplateToken): Exp {
    const exps = tok.substitutions.map((sub) => {
      const subTokens = tokenize(sub.source, {
        file: this.file, line: sub.line, column: sub.column, offset: sub.offset,
      })
      const savedTokens = this.tokens
      const savedPos = this.pos
      this.tokens = subTokens
      this.pos = 0
      try {
        const exp = this.withIn(() => this.parseExpression())
        if (this.peek().kind !== 'eof') {
          this.expected("'}'")
        }
        return exp
      } finally {
        this.tokens = savedTokens
        this.pos = savedPos
      }
    })
    return new TemplateLiteral(this.loc(tok), tok.quasis, exps)
  }

  private parseArrayLiteral(): Exp {
    const loc = this.loc()
    this.expect('[')
    const elements: (Exp | null)[] = []
    this.withIn(() => {
      while (!this.eat(']')) {
        if (this.eat(',')) {
          elements.push(null)
          continue
        }
        const tok = this.peek()
        if (this.eat('...')) {
          elements.push(new Spread(this.loc(tok), this.parseAssignment()))
        } else {
          elements.push(this.parseAssignment())
        }
        if (!this.at(']')) {
          this.expect(',')
        }
      }
    })
    return new ArrayLiteral(loc, elements)
  }

  private parseObjectLiteral(): Exp {
    const loc = this.loc()
    this.expect('{')
    const properties: (Property | Spread)[] = []
    this.withIn(() => {
      while (!this.eat('}')) {
        const tok = this.peek()
        const propLoc = this.loc(tok)
        if (this.eat('...')) {
          properties.push(new Spread(propLoc, this.parseAssignment()))
        } else {
          let isAsync = false
          if (this.atContextual('async') && !this.at('(', 1) && !this.at(':', 1)
            && !this.at(',', 1) && !this.at('}', 1) && !this.at('=', 1)) {
            this.next()
            isAsync = true
          }
          const accessor = isAsync ? undefined : this.atAccessor()
          if (accessor !== undefined) {
            this.next()
          }
          const keyTok = this.peek()
          const {key, computed} = this.parsePropertyKey()
          if (accessor !== undefined) {
            const methodName = computed || !(key instanceof Literal) ? undefined : String(key.value)
            properties.push(new Property(propLoc, key, computed, this.parseAccessor(accessor, keyTok, methodName), accessor))
          } else if (this.at('(')) {
            const methodName = computed || !(key instanceof Literal) ? undefined : String(key.value)
            const fn = this.parseFunctionRest(this.loc(keyTok), methodName, 'method', isAsync)
            properties.push(new Property(propLoc, key, computed, fn))
          } else if (isAsync) {
            this.expected("'('")
          } else if (this.eat(':')) {
            const value = this.parseAssignment()
            if (!computed && key instanceof Literal) {
              inferName(value, String(key.value))
            }
            properties.push(new Property(propLoc, key, computed, value))
          } else {
            if (computed || keyTok.kind !== 'identifier') {
              this.expected("':'")
            }
            let value: Exp = new Identifier(this.loc(keyTok), keyTok.lexeme)
            if (this.at('=')) {
              // Shorthand with default, valid only once reinterpreted as a pattern.
              this.next()
              value = new Assign(this.loc(keyTok), '=', new Identifier(this.loc(keyTok), keyTok.lexeme), this.parseAssignment())
            }
            properties.push(new Property(propLoc, key, computed, value))
          }
        }
        if (!this.at('}')) {
          this.expect(',')
        }
      }
    })
    return new ObjectLiteral(loc, properties)
  }
}

export function parse(input: string | Token[], options: ParseOptions = {}): Program {
  const file = options.file ?? '<input>'
  const tokens = typeof input === 'string' ? tokenize(input, {file}) : input
  return new Parser(tokens, file, options.module ?? true).parseProgram()
}
