// Kite abstract syntax tree.
// © Reuben Thomas 2023-2025
// Released under the MIT license.

import {SourceLoc} from './error.js'

export abstract class Node {
  constructor(public loc: SourceLoc) {}
}

export abstract class Exp extends Node {}

export abstract class Statement extends Node {}

export type LiteralValue = undefined | null | boolean | number | string

export class Literal extends Exp {
  constructor(loc: SourceLoc, public value: LiteralValue) {
    super(loc)
  }
}

export class TemplateLiteral extends Exp {
  // quasis.length === exps.length + 1
  constructor(loc: SourceLoc, public quasis: string[], public exps: Exp[]) {
    super(loc)
  }
}

export class Identifier extends Exp {
  constructor(loc: SourceLoc, public name: string) {
    super(loc)
  }
}

export class ThisExp extends Exp {}

export class SuperCall extends Exp {
  constructor(loc: SourceLoc, public args: Exp[]) {
    super(loc)
  }
}

export class SuperProperty extends Exp {
  constructor(loc: SourceLoc, public property: Exp, public computed: boolean) {
    super(loc)
  }
}

export class Spread extends Exp {
  constructor(loc: SourceLoc, public argument: Exp) {
    super(loc)
  }
}

export class ArrayLiteral extends Exp {
  // A null element is a hole.
  constructor(loc: SourceLoc, public elements: (Exp | null)[]) {
    super(loc)
  }
}

// Getters and setters; 'init' is an ordinary property or method.
export type PropertyKind = 'init' | 'get' | 'set'

export type AccessorKind = Exclude<PropertyKind, 'init'>

export class Property extends Node {
  constructor(
    loc: SourceLoc,
    public key: Exp,
    public computed: boolean,
    public value: Exp,
    public kind: PropertyKind = 'init',
  ) {
    super(loc)
  }
}

export class ObjectLiteral extends Exp {
  constructor(loc: SourceLoc, public properties: (Property | Spread)[]) {
    super(loc)
  }
}

export interface PatternElement {
  target: Pattern
  init?: Exp
}

export type FunctionKind = 'normal' | 'arrow' | 'method' | 'constructor'

export class FunctionExp extends Exp {
  // Name taken from the binding or property an anonymous function is assigned to.
  inferredName?: string

  constructor(
    loc: SourceLoc,
    public name: string | undefined,
    public params: PatternElement[],
    public restParam: Pattern | undefined,
    // An arrow function with an expression body has an Exp here.
    public body: Block | Exp,
    public kind: FunctionKind,
    public isAsync: boolean,
  ) {
    super(loc)
  }

  get isArrow() {
    return this.kind === 'arrow'
  }
}

export class ClassMember extends Node {
  constructor(
    loc: SourceLoc,
    public key: Exp,
    public computed: boolean,
    public isStatic: boolean,
    public value: FunctionExp,
    public kind: PropertyKind = 'init',
  ) {
    super(loc)
  }
}

export class ClassExp extends Exp {
  inferredName?: string

  constructor(
    loc: SourceLoc,
    public name: string | undefined,
    public superClass: Exp | undefined,
    public ctor: FunctionExp | undefined,
    public members: ClassMember[],
  ) {
    super(loc)
  }
}

export type UnaryOp = '!' | '-' | '+' | 'typeof' | 'void' | 'delete'

export class Unary extends Exp {
  constructor(loc: SourceLoc, public op: UnaryOp, public argument: Exp) {
    super(loc)
  }
}

export class Update extends Exp {
  constructor(
    loc: SourceLoc,
    public op: '++' | '--',
    public prefix: boolean,
    public target: Identifier | Member,
  ) {
    super(loc)
  }
}

export type BinaryOp =
  | '+' | '-' | '*' | '/' | '%' | '**'
  | '==' | '!=' | '===' | '!=='
  | '<' | '>' | '<=' | '>='
  | 'instanceof' | 'in'

export class Binary extends Exp {
  constructor(loc: SourceLoc, public op: BinaryOp, public left: Exp, public right: Exp) {
    super(loc)
  }
}

export type LogicalOp = '&&' | '||' | '??'

export class Logical extends Exp {
  constructor(loc: SourceLoc, public op: LogicalOp, public left: Exp, public right: Exp) {
    super(loc)
  }
}

export class Conditional extends Exp {
  constructor(loc: SourceLoc, public test: Exp, public consequent: Exp, public alternate: Exp) {
    super(loc)
  }
}

// The comma operator: its value is that of the last expression.
export class Sequence extends Exp {
  constructor(loc: SourceLoc, public expressions: Exp[]) {
    super(loc)
  }
}

export type AssignOp = '=' | '+=' | '-=' | '*=' | '/=' | '%=' | '**='

export class Assign extends Exp {
  constructor(loc: SourceLoc, public op: AssignOp, public target: Pattern, public value: Exp) {
    super(loc)
  }
}

export class Member extends Exp {
  // A non-computed property is a string Literal.
  constructor(loc: SourceLoc, public object: Exp, public property: Exp, public computed: boolean) {
    super(loc)
  }
}

export class Call extends Exp {
  constructor(loc: SourceLoc, public callee: Exp, public args: Exp[]) {
    super(loc)
  }
}

export class New extends Exp {
  constructor(loc: SourceLoc, public callee: Exp, public args: Exp[]) {
    super(loc)
  }
}

export class Await extends Exp {
  constructor(loc: SourceLoc, public argument: Exp) {
    super(loc)
  }
}

export class PatternProperty extends Node {
  constructor(
    loc: SourceLoc,
    public key: Exp,
    public computed: boolean,
    public value: PatternElement,
  ) {
    super(loc)
  }
}

export class ObjectPattern extends Node {
  constructor(loc: SourceLoc, public properties: PatternProperty[], public rest?: Pattern) {
    super(loc)
  }
}

export class ArrayPattern extends Node {
  constructor(loc: SourceLoc, public elements: (PatternElement | null)[], public rest?: Pattern) {
    super(loc)
  }
}

export type Pattern = Identifier | Member | ObjectPattern | ArrayPattern

export type DeclKind = 'var' | 'let' | 'const'

export class VarDecl extends Statement {
  constructor(loc: SourceLoc, public kind: DeclKind, public declarations: PatternElement[]) {
    super(loc)
  }
}

export class FunctionDecl extends Statement {
  constructor(loc: SourceLoc, public name: string, public fn: FunctionExp) {
    super(loc)
  }
}

export class ClassDecl extends Statement {
  constructor(loc: SourceLoc, public name: string, public cls: ClassExp) {
    super(loc)
  }
}

export class ExpStatement extends Statement {
  constructor(loc: SourceLoc, public exp: Exp) {
    super(loc)
  }
}

export class Block extends Statement {
  constructor(loc: SourceLoc, public body: Statement[]) {
    super(loc)
  }
}

export class If extends Statement {
  constructor(loc: SourceLoc, public test: Exp, public consequent: Statement, public alternate?: Statement) {
    super(loc)
  }
}

export class While extends Statement {
  constructor(loc: SourceLoc, public test: Exp, public body: Statement) {
    super(loc)
  }
}

export class DoWhile extends Statement {
  constructor(loc: SourceLoc, public body: Statement, public test: Exp) {
    super(loc)
  }
}

export class For extends Statement {
  constructor(
    loc: SourceLoc,
    public init: VarDecl | Exp | undefined,
    public test: Exp | undefined,
    public update: Exp | undefined,
    public body: Statement,
  ) {
    super(loc)
  }
}

// The left side of for-of and for-in is either a one-name declaration
// without initializer, or an assignment target.
export class ForOf extends Statement {
  constructor(loc: SourceLoc, public left: VarDecl | Pattern, public right: Exp, public body: Statement) {
    super(loc)
  }
}

export class ForIn extends Statement {
  constructor(loc: SourceLoc, public left: VarDecl | Pattern, public right: Exp, public body: Statement) {
    super(loc)
  }
}

export class SwitchCase extends Node {
  // test is undefined for `default`.
  constructor(loc: SourceLoc, public test: Exp | undefined, public body: Statement[]) {
    super(loc)
  }
}

export class Switch extends Statement {
  constructor(loc: SourceLoc, public discriminant: Exp, public cases: SwitchCase[]) {
    super(loc)
  }
}

export class Try extends Statement {
  constructor(
    loc: SourceLoc,
    public block: Block,
    public param: Pattern | undefined,
    public handler: Block | undefined,
    public finalizer: Block | undefined,
  ) {
    super(loc)
  }
}

export class Return extends Statement {
  constructor(loc: SourceLoc, public argument?: Exp) {
    super(loc)
  }
}

export class Break extends Statement {}

export class Continue extends Statement {}

export class Throw extends Statement {
  constructor(loc: SourceLoc, public argument: Exp) {
    super(loc)
  }
}

export class Empty extends Statement {}

export interface ImportSpecifier {
  imported: string
  local: string
}

export class Import extends Statement {
  constructor(
    loc: SourceLoc,
    public source: string,
    public defaultName: string | undefined,
    public namespaceName: string | undefined,
    public specifiers: ImportSpecifier[],
  ) {
    super(loc)
  }
}

export class ExportDecl extends Statement {
  constructor(loc: SourceLoc, public declaration: VarDecl | FunctionDecl | ClassDecl) {
    super(loc)
  }
}

export class ExportDefault extends Statement {
  constructor(loc: SourceLoc, public value: Exp | FunctionDecl | ClassDecl) {
    super(loc)
  }
}

export interface ExportSpecifier {
  local: string
  exported: string
}

export class ExportNames extends Statement {
  constructor(loc: SourceLoc, public specifiers: ExportSpecifier[]) {
    super(loc)
  }
}

export class Program extends Node {
  constructor(loc: SourceLoc, public body: Statement[], public file: string) {
    super(loc)
  }
}

// Names bound by a pattern, in source order.
export function boundNames(pattern: Pattern): string[] {
  if (pattern instanceof Identifier) {
    return [pattern.name]
  } else if (pattern instanceof ObjectPattern) {
    const names = pattern.properties.flatMap((p) => boundNames(p.value.target))
    return pattern.rest ? [...names, ...boundNames(pattern.rest)] : names
  } else if (pattern instanceof ArrayPattern) {
    const names = pattern.elements.flatMap((e) => (e ? boundNames(e.target) : []))
    return pattern.rest ? [...names, ...boundNames(pattern.rest)] : names
  }
  return []
}

// Name an anonymous function or class after what it is assigned to.
export function inferName(exp: Exp | undefined, name: string) {
  if ((exp instanceof FunctionExp || exp instanceof ClassExp) && exp.name === undefined) {
    exp.inferredName ??= name
  }
}

// A name for debugging output and error messages, if the expression has one.
export function expName(exp: Exp): string | undefined {
  if (exp instanceof Identifier) {
    return exp.name
  } else if (exp instanceof Member) {
    const objName = exp.object instanceof ThisExp ? 'this' : expName(exp.object)
    if (!exp.computed && exp.property instanceof Literal && objName !== undefined) {
      return `${objName}.${String(exp.property.value)}`
    }
  }
  return undefined
}

// The module-scope binding that holds `export default <expression>`.
export const defaultExportName = '*default*'

export function importedNames(stmt: Import): string[] {
  return [
    ...(stmt.defaultName === undefined ? [] : [stmt.defaultName]),
    ...(stmt.namespaceName === undefined ? [] : [stmt.namespaceName]),
    ...stmt.specifiers.map((s) => s.local),
  ]
}

function collectVarNames(statements: Statement[], names: string[]) {
  for (const stmt of statements) {
    if (stmt instanceof VarDecl) {
      if (stmt.kind === 'var') {
        names.push(...stmt.declarations.flatMap((d) => boundNames(d.target)))
      }
    } else if (stmt instanceof ExportDecl) {
      collectVarNames([stmt.declaration], names)
    } else if (stmt instanceof Block) {
      collectVarNames(stmt.body, names)
    } else if (stmt instanceof If) {
      collectVarNames(stmt.alternate ? [stmt.consequent, stmt.alternate] : [stmt.consequent], names)
    } else if (stmt instanceof While || stmt instanceof DoWhile) {
      collectVarNames([stmt.body], names)
    } else if (stmt instanceof For) {
      collectVarNames(stmt.init instanceof VarDecl ? [stmt.init, stmt.body] : [stmt.body], names)
    } else if (stmt instanceof ForOf || stmt instanceof ForIn) {
      collectVarNames(stmt.left instanceof VarDecl ? [stmt.left, stmt.body] : [stmt.body], names)
    } else if (stmt instanceof Try) {
      collectVarNames([stmt.block, ...(stmt.handler ? [stmt.handler] : []), ...(stmt.finalizer ? [stmt.finalizer] : [])], names)
    } else if (stmt instanceof Switch) {
      collectVarNames(stmt.cases.flatMap((c) => c.body), names)
    }
  }
}

// Names declared with `var` in a function body, not counting nested
// functions.
export function varDeclaredNames(statements: Statement[]): string[] {
  const names: string[] = []
  collectVarNames(statements, names)
  return [...new Set(names)]
}
