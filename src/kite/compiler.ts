// Compile Kite ASTs to bytecode.
// © Reuben Thomas 2023-2025
// Released under the MIT license.

import {
  ArrayLiteral, ArrayPattern, Assign, Await, Binary, BinaryOp, Block, Break, Call,
  ClassDecl, ClassExp, ClassMember, Conditional, Continue, DoWhile, Empty, Exp,
  ExportDecl, ExportDefault, ExportNames, ExpStatement, For, ForIn, ForOf,
  FunctionDecl, FunctionExp, Identifier, If, Import, Literal, Logical, Member, New,
  Node, ObjectLiteral, ObjectPattern, Pattern, PatternProperty, Program, Property,
  Return, Sequence, Spread, Statement, SuperCall, SuperProperty, Switch, SwitchCase,
  TemplateLiteral, ThisExp, Throw, Try, Unary, Update, VarDecl, While,
  boundNames, defaultExportName, expName, importedNames, varDeclaredNames,
} from './ast.js'
import {
  Chunk, ClassTemplate, Constant, FunctionTemplate, ImportTemplate, Op,
  bindingKinds, disassembleChunk, eliminateDeadCode,
} from './chunk.js'
import {FunctionBody} from './data.js'
import {BindingKind} from './environment.js'
import {KiteInternalError, SourceLoc} from './error.js'
import {foldNumbers} from './operators.js'
import {trace} from './util.js'

export type ProgramBody =
  | {kind: 'compiled', chunk: Chunk}
  | {kind: 'bridged', reason: string}

export interface CompiledProgram {
  program: Program
  main: ProgramBody
  // Every function in the program, outer functions before inner ones.
  bodies: Map<FunctionExp, FunctionBody>
}

// The AST nodes directly below `node`.
function children(node: Node): Node[] {
  const elements = (elems: ({target: Pattern, init?: Exp} | null)[]) => elems.flatMap(
    (e) => (e === null ? [] : e.init === undefined ? [e.target] : [e.target, e.init]),
  )
  if (node instanceof TemplateLiteral) {
    return node.exps
  } else if (node instanceof SuperCall || node instanceof New || node instanceof Call) {
    return node instanceof SuperCall ? node.args : [node.callee, ...node.args]
  } else if (node instanceof SuperProperty) {
    return [node.property]
  } else if (node instanceof Spread || node instanceof Await || node instanceof Unary) {
    return [node.argument]
  } else if (node instanceof ArrayLiteral) {
    return node.elements.filter((e): e is Exp => e !== null)
  } else if (node instanceof Property || node instanceof ClassMember) {
    return [node.key, node.value]
  } else if (node instanceof ObjectLiteral) {
    return node.properties
  } else if (node instanceof FunctionExp) {
    return [...elements(node.params), ...(node.restParam ? [node.restParam] : []), node.body]
  } else if (node instanceof ClassExp) {
    return [...(node.superClass ? [node.superClass] : []), ...(node.ctor ? [node.ctor] : []), ...node.members]
  } else if (node instanceof Update) {
    return [node.target]
  } else if (node instanceof Binary || node instanceof Logical) {
    return [node.left, node.right]
  } else if (node instanceof Conditional) {
    return [node.test, node.consequent, node.alternate]
  } else if (node instanceof Sequence) {
    return node.expressions
  } else if (node instanceof Assign) {
    return [node.target, node.value]
  } else if (node instanceof Member) {
    return [node.object, node.property]
  } else if (node instanceof PatternProperty) {
    return [node.key, ...elements([node.value])]
  } else if (node instanceof ObjectPattern) {
    return [...node.properties, ...(node.rest ? [node.rest] : [])]
  } else if (node instanceof ArrayPattern) {
    return [...elements(node.elements), ...(node.rest ? [node.rest] : [])]
  } else if (node instanceof VarDecl) {
    return elements(node.declarations)
  } else if (node instanceof FunctionDecl) {
    return [node.fn]
  } else if (node instanceof ClassDecl) {
    return [node.cls]
  } else if (node instanceof ExpStatement) {
    return [node.exp]
  } else if (node instanceof Block || node instanceof Program) {
    return node.body
  } else if (node instanceof If) {
    return [node.test, node.consequent, ...(node.alternate ? [node.alternate] : [])]
  } else if (node instanceof While || node instanceof DoWhile) {
    return [node.test, node.body]
  } else if (node instanceof For) {
    return [node.init, node.test, node.update, node.body].filter((n): n is Node => n !== undefined)
  } else if (node instanceof ForOf || node instanceof ForIn) {
    return [node.left, node.right, node.body]
  } else if (node instanceof SwitchCase) {
    return [...(node.test ? [node.test] : []), ...node.body]
  } else if (node instanceof Switch) {
    return [node.discriminant, ...node.cases]
  } else if (node instanceof Try) {
    return [node.block, node.param, node.handler, node.finalizer].filter((n): n is Pattern | Block => n !== undefined)
  } else if (node instanceof Return || node instanceof Throw) {
    return node.argument ? [node.argument] : []
  } else if (node instanceof ExportDecl) {
    return [node.declaration]
  } else if (node instanceof ExportDefault) {
    return [node.value]
  }
  return []
}

interface OwnCode {
  // Why the code cannot be compiled, if it cannot.
  bridgeReason?: string
  // Functions defined directly in the code.
  nested: FunctionExp[]
}

// Examine the code of one function, not descending into the functions it
// defines.
function scanOwnCode(roots: Node[]): OwnCode {
  const result: OwnCode = {nested: []}
  const bridge = (reason: string) => {
    result.bridgeReason ??= reason
  }
  const visit = (node: Node) => {
    if (node instanceof FunctionExp) {
      result.nested.push(node)
      return
    } else if (node instanceof ClassExp) {
      if (node.superClass !== undefined) {
        visit(node.superClass)
      }
      if (node.ctor !== undefined) {
        result.nested.push(node.ctor)
      }
      for (const member of node.members) {
        if (member.computed) {
          bridge('computed class member name')
          visit(member.key)
        }
        result.nested.push(member.value)
      }
      return
    } else if (node instanceof Await) {
      bridge('await')
    } else if (node instanceof SuperCall || node instanceof SuperProperty) {
      bridge('super')
    } else if (node instanceof ObjectPattern || node instanceof ArrayPattern) {
      bridge('destructuring')
    }
    children(node).forEach(visit)
  }
  roots.forEach(visit)
  return result
}

type Exit =
  | {kind: 'scope'}
  | {kind: 'try', finalizer?: Block}
  | {kind: 'loop', breaks: number[], continues: number[]}
  | {kind: 'switch', breaks: number[]}

function identifierName(pattern: Pattern): string {
  if (!(pattern instanceof Identifier)) {
    throw new KiteInternalError('Destructuring pattern in compiled code')
  }
  return pattern.name
}

function literalKey(key: Exp): string {
  if (!(key instanceof Literal)) {
    throw new KiteInternalError('Computed key in compiled code')
  }
  return String(key.value)
}

const binaryOps = new Map<BinaryOp, Op>([
  ['+', Op.ADD], ['-', Op.SUB], ['*', Op.MUL], ['/', Op.DIV], ['%', Op.MOD], ['**', Op.POW],
  ['==', Op.EQ], ['!=', Op.NE], ['===', Op.STRICT_EQ], ['!==', Op.STRICT_NE],
  ['<', Op.LT], ['>', Op.GT], ['<=', Op.LE], ['>=', Op.GE],
  ['instanceof', Op.INSTANCEOF], ['in', Op.IN],
])

const compoundOps = new Map<Assign['op'], Op>([
  ['+=', Op.ADD], ['-=', Op.SUB], ['*=', Op.MUL], ['/=', Op.DIV], ['%=', Op.MOD], ['**=', Op.POW],
])

function hasLexicalDeclarations(statements: Statement[]) {
  return statements.some((stmt) => {
    const decl = stmt instanceof ExportDecl ? stmt.declaration : stmt
    return decl instanceof FunctionDecl || decl instanceof ClassDecl
      || (decl instanceof VarDecl && decl.kind !== 'var')
  })
}

class FunctionCompiler {
  private exits: Exit[] = []

  // Slot numbers of the names declared in each enclosing block, when the
  // chunk uses slots.
  private blocks: Map<string, number>[] = []

  constructor(readonly chunk: Chunk, private readonly isProgram: boolean) {}

  private emit(loc: SourceLoc, op: Op, ...operands: number[]) {
    return this.chunk.emit(loc, op, ...operands)
  }

  private constant(value: Constant) {
    return this.chunk.addConstant(value)
  }

  private desc(exp: Exp) {
    const name = expName(exp)
    return name === undefined ? -1 : this.constant(name)
  }

  // Index of the innermost exit of one of the given kinds.
  private innermost(kinds: Exit['kind'][]) {
    for (let i = this.exits.length - 1; i >= 0; i -= 1) {
      if (kinds.includes(this.exits[i].kind)) {
        return i
      }
    }
    return -1
  }

  private get here() {
    return this.chunk.code.length
  }

  private patchHere(offsets: number[]) {
    for (const offset of offsets) {
      this.chunk.patch(offset, this.here)
    }
  }

  // Names.

  private slotFor(name: string): number | undefined {
    for (let i = this.blocks.length - 1; i >= 0; i -= 1) {
      const slot = this.blocks[i].get(name)
      if (slot !== undefined) {
        return slot
      }
    }
    return undefined
  }

  private newSlot(name: string, kind: BindingKind) {
    const slot = this.chunk.addSlot(name, kind)
    this.blocks[this.blocks.length - 1].set(name, slot)
    return slot
  }

  private getName(loc: SourceLoc, name: string) {
    const slot = this.slotFor(name)
    if (slot !== undefined) {
      this.emit(loc, Op.GET_LOCAL, slot)
    } else {
      this.emit(loc, Op.GET_NAME, this.constant(name))
    }
  }

  private setName(loc: SourceLoc, name: string) {
    const slot = this.slotFor(name)
    if (slot !== undefined) {
      this.emit(loc, Op.SET_LOCAL, slot)
    } else {
      this.emit(loc, Op.SET_NAME, this.constant(name))
    }
  }

  private initName(loc: SourceLoc, name: string, kind: BindingKind) {
    let slot = this.slotFor(name)
    if (this.chunk.usesSlots && kind !== 'var' && this.blocks[this.blocks.length - 1].get(name) === undefined) {
      slot = this.newSlot(name, kind)
    }
    if (slot !== undefined) {
      this.emit(loc, Op.INIT_LOCAL, slot)
    } else {
      this.emit(loc, Op.INIT_NAME, this.constant(name), bindingKinds.indexOf(kind))
    }
  }

  private declareVars(loc: SourceLoc, statements: Statement[]) {
    for (const name of varDeclaredNames(statements)) {
      if (!this.chunk.usesSlots) {
        this.emit(loc, Op.DECLARE_NAME, this.constant(name), bindingKinds.indexOf('var'))
      } else if (this.blocks[0].get(name) === undefined) {
        this.blocks[0].set(name, this.chunk.addSlot(name, 'var'))
      }
    }
  }

  private declareLexical(loc: SourceLoc, statements: Statement[]) {
    const declare = (name: string, kind: BindingKind) => {
      if (this.chunk.usesSlots) {
        this.emit(loc, Op.DECLARE_LOCAL, this.newSlot(name, kind))
      } else {
        this.emit(loc, Op.DECLARE_NAME, this.constant(name), bindingKinds.indexOf(kind))
      }
    }
    for (const stmt of statements) {
      let decl: Statement = stmt
      if (stmt instanceof ExportDecl) {
        decl = stmt.declaration
      } else if (stmt instanceof ExportDefault && !(stmt.value instanceof Exp)) {
        decl = stmt.value
      }
      if (decl instanceof FunctionDecl) {
        this.emit(loc, Op.DECLARE_FUNCTION, this.constant(decl.name), this.constant(new FunctionTemplate(decl.fn)))
      } else if (decl instanceof ClassDecl) {
        declare(decl.name, 'class')
      } else if (decl instanceof VarDecl && decl.kind !== 'var') {
        for (const name of decl.declarations.flatMap((d) => boundNames(d.target))) {
          declare(name, decl.kind)
        }
      } else if (decl instanceof Import) {
        for (const name of importedNames(decl)) {
          declare(name, 'import')
        }
      } else if (decl instanceof ExportDefault) {
        declare(defaultExportName, 'const')
      }
    }
  }

  // Enter a block scope: a Scope at run time, or a slot map.
  private enterBlock(loc: SourceLoc, statements: Statement[]) {
    if (this.chunk.usesSlots) {
      this.blocks.push(new Map())
    } else if (hasLexicalDeclarations(statements)) {
      this.emit(loc, Op.PUSH_SCOPE)
      this.exits.push({kind: 'scope'})
    } else {
      return false
    }
    this.declareLexical(loc, statements)
    return true
  }

  private leaveBlock(loc: SourceLoc, entered: boolean) {
    if (this.chunk.usesSlots) {
      this.blocks.pop()
    } else if (entered) {
      this.exits.pop()
      this.emit(loc, Op.POP_SCOPE)
    }
  }

  // Entry points.

  compileProgram(program: Program) {
    this.declareVars(program.loc, program.body)
    this.declareLexical(program.loc, program.body)
    this.statements(program.body)
    this.emit(program.loc, Op.GET_COMPLETION)
    this.emit(program.loc, Op.RETURN)
    eliminateDeadCode(this.chunk)
  }

  compileFunction(node: FunctionExp) {
    const chunk = this.chunk
    this.blocks.push(new Map())
    for (const param of node.params) {
      const name = identifierName(param.target)
      chunk.params.push(name)
      if (chunk.usesSlots) {
        this.newSlot(name, 'param')
      }
    }
    if (node.restParam !== undefined) {
      chunk.restParam = identifierName(node.restParam)
      if (chunk.usesSlots) {
        this.newSlot(chunk.restParam, 'param')
      }
    }
    for (const param of node.params) {
      if (param.init !== undefined) {
        const name = identifierName(param.target)
        this.getName(param.target.loc, name)
        const skip = this.emit(param.target.loc, Op.JUMP_IF_NOT_UNDEFINED, 0)
        this.expression(param.init)
        this.setName(param.target.loc, name)
        this.emit(param.target.loc, Op.POP)
        this.patchHere([skip])
      }
    }
    if (node.body instanceof Block) {
      this.declareVars(node.loc, node.body.body)
      this.declareLexical(node.loc, node.body.body)
      this.statements(node.body.body)
      this.emit(node.loc, Op.UNDEFINED)
    } else {
      this.expression(node.body)
    }
    this.emit(node.loc, Op.RETURN)
    this.blocks.pop()
    eliminateDeadCode(chunk)
  }

  // Run the cleanup for leaving exits[downTo..]: scopes are popped and
  // finally blocks run. Stack items (switch discriminants) are popped unless
  // the frame is returning.
  private emitExits(loc: SourceLoc, downTo: number, popStack: boolean) {
    for (let i = this.exits.length - 1; i >= downTo; i -= 1) {
      const exit = this.exits[i]
      if (exit.kind === 'scope') {
        this.emit(loc, Op.POP_SCOPE)
      } else if (exit.kind === 'switch' && popStack) {
        this.emit(loc, Op.POP)
      } else if (exit.kind === 'try') {
        this.emit(loc, Op.END_TRY)
        if (exit.finalizer !== undefined) {
          const saved = this.exits
          this.exits = saved.slice(0, i)
          this.statement(exit.finalizer)
          this.exits = saved
        }
      }
    }
  }

  // Statements.

  private statements(statements: Statement[]) {
    for (const stmt of statements) {
      this.statement(stmt)
    }
  }

  private varDecl(decl: VarDecl) {
    for (const d of decl.declarations) {
      const name = identifierName(d.target)
      if (d.init !== undefined) {
        this.expression(d.init)
      } else if (decl.kind === 'var') {
        continue
      } else {
        this.emit(d.target.loc, Op.UNDEFINED)
      }
      this.initName(d.target.loc, name, decl.kind)
    }
  }

  private loopBody(body: Statement) {
    const loop: Exit & {kind: 'loop'} = {kind: 'loop', breaks: [], continues: []}
    this.exits.push(loop)
    this.statement(body)
    this.exits.pop()
    return loop
  }

  private forLoop(stmt: For) {
    const init = stmt.init
    const perIteration = !this.chunk.usesSlots && init instanceof VarDecl && init.kind !== 'var'
    if (this.chunk.usesSlots) {
      this.blocks.push(new Map())
    } else if (perIteration) {
      this.emit(stmt.loc, Op.PUSH_SCOPE)
      this.exits.push({kind: 'scope'})
    }
    if (init instanceof VarDecl) {
      this.declareLexical(init.loc, [init])
      this.varDecl(init)
    } else if (init !== undefined) {
      this.expression(init)
      this.emit(init.loc, Op.POP)
    }
    if (perIteration) {
      this.emit(stmt.loc, Op.COPY_SCOPE)
    }
    const top = this.here
    const exitJumps: number[] = []
    if (stmt.test !== undefined) {
      this.expression(stmt.test)
      exitJumps.push(this.emit(stmt.test.loc, Op.JUMP_IF_FALSE, 0))
    }
    const loop = this.loopBody(stmt.body)
    this.patchHere(loop.continues)
    if (perIteration) {
      this.emit(stmt.loc, Op.COPY_SCOPE)
    }
    if (stmt.update !== undefined) {
      this.expression(stmt.update)
      this.emit(stmt.update.loc, Op.POP)
    }
    this.emit(stmt.loc, Op.JUMP, top)
    this.patchHere([...exitJumps, ...loop.breaks])
    if (this.chunk.usesSlots) {
      this.blocks.pop()
    } else if (perIteration) {
      this.exits.pop()
      this.emit(stmt.loc, Op.POP_SCOPE)
    }
  }

  // Bind the value on top of the stack to a for-of or for-in loop variable.
  private bindLoopVariable(left: VarDecl | Pattern) {
    if (left instanceof VarDecl) {
      const target = left.declarations[0].target
      this.initName(target.loc, identifierName(target), left.kind)
    } else if (left instanceof Member) {
      this.expression(left.object)
      this.propertyKey(left.property, left.computed)
      this.emit(left.loc, Op.ROT3)
      this.emit(left.loc, Op.SET_PROP)
      this.emit(left.loc, Op.POP)
    } else {
      this.setName(left.loc, identifierName(left))
      this.emit(left.loc, Op.POP)
    }
  }

  private forEachLoop(stmt: ForOf | ForIn) {
    this.expression(stmt.right)
    if (stmt instanceof ForOf) {
      this.emit(stmt.loc, Op.ITER_START, this.desc(stmt.right))
    } else {
      this.emit(stmt.loc, Op.ITER_KEYS)
    }
    const next = this.here
    const done = this.emit(stmt.loc, Op.ITER_NEXT, 0)
    const loop: Exit & {kind: 'loop'} = {kind: 'loop', breaks: [], continues: []}
    this.exits.push(loop)
    if (this.chunk.usesSlots) {
      this.blocks.push(new Map())
    } else {
      this.emit(stmt.loc, Op.PUSH_SCOPE)
      this.exits.push({kind: 'scope'})
    }
    this.bindLoopVariable(stmt.left)
    this.statement(stmt.body)
    if (this.chunk.usesSlots) {
      this.blocks.pop()
    } else {
      this.exits.pop()
      this.emit(stmt.loc, Op.POP_SCOPE)
    }
    this.exits.pop()
    this.emit(stmt.loc, Op.JUMP, next)
    for (const offset of loop.continues) {
      this.chunk.patch(offset, next)
    }
    this.patchHere([done, ...loop.breaks])
    this.emit(stmt.loc, Op.ITER_END)
  }

  private switchStatement(stmt: Switch) {
    this.expression(stmt.discriminant)
    const exit: Exit & {kind: 'switch'} = {kind: 'switch', breaks: []}
    this.exits.push(exit)
    const bodies = stmt.cases.flatMap((c) => c.body)
    const entered = this.enterBlock(stmt.loc, bodies)
    const caseJumps = new Map<SwitchCase, number>()
    for (const c of stmt.cases) {
      if (c.test !== undefined) {
        this.emit(c.loc, Op.DUP)
        this.expression(c.test)
        this.emit(c.loc, Op.STRICT_EQ)
        caseJumps.set(c, this.emit(c.loc, Op.JUMP_IF_TRUE, 0))
      }
    }
    const defaultJump = this.emit(stmt.loc, Op.JUMP, 0)
    let hasDefault = false
    for (const c of stmt.cases) {
      const jump = caseJumps.get(c)
      if (jump === undefined) {
        hasDefault = true
        this.patchHere([defaultJump])
      } else {
        this.patchHere([jump])
      }
      this.statements(c.body)
    }
    if (!hasDefault) {
      this.patchHere([defaultJump])
    }
    this.leaveBlock(stmt.loc, entered)
    this.exits.pop()
    this.patchHere(exit.breaks)
    this.emit(stmt.loc, Op.POP)
  }

  // The catch clause runs with the thrown value on the stack.
  private catchClause(stmt: Try, handler: Block) {
    if (this.chunk.usesSlots) {
      this.blocks.push(new Map())
    } else {
      this.emit(handler.loc, Op.PUSH_SCOPE)
      this.exits.push({kind: 'scope'})
    }
    if (stmt.param !== undefined) {
      this.initName(stmt.param.loc, identifierName(stmt.param), 'let')
    } else {
      this.emit(handler.loc, Op.POP)
    }
    this.declareLexical(handler.loc, handler.body)
    this.statements(handler.body)
    if (this.chunk.usesSlots) {
      this.blocks.pop()
    } else {
      this.exits.pop()
      this.emit(handler.loc, Op.POP_SCOPE)
    }
  }

  // `finally` is compiled once on each path out of the statement.
  private tryStatement(stmt: Try) {
    const finalizer = stmt.finalizer
    const tryOp = this.emit(stmt.loc, stmt.handler === undefined ? Op.TRY_FINALLY : Op.TRY, 0)
    this.exits.push({kind: 'try', finalizer})
    this.statement(stmt.block)
    this.exits.pop()
    this.emit(stmt.loc, Op.END_TRY)
    if (finalizer !== undefined) {
      this.statement(finalizer)
    }
    const endJumps = [this.emit(stmt.loc, Op.JUMP, 0)]
    this.patchHere([tryOp])
    if (stmt.handler !== undefined) {
      if (finalizer === undefined) {
        this.catchClause(stmt, stmt.handler)
      } else {
        const rethrowOp = this.emit(stmt.loc, Op.TRY_FINALLY, 0)
        this.exits.push({kind: 'try', finalizer})
        this.catchClause(stmt, stmt.handler)
        this.exits.pop()
        this.emit(stmt.loc, Op.END_TRY)
        this.statement(finalizer)
        endJumps.push(this.emit(stmt.loc, Op.JUMP, 0))
        this.patchHere([rethrowOp])
        this.statement(finalizer)
        this.emit(stmt.loc, Op.RETHROW)
      }
    } else if (finalizer !== undefined) {
      this.statement(finalizer)
      this.emit(stmt.loc, Op.RETHROW)
    }
    this.patchHere(endJumps)
  }

  private classDefinition(node: ClassExp) {
    const members = node.members.map((m) => ({key: literalKey(m.key), isStatic: m.isStatic, kind: m.kind, fn: m.value}))
    const name = node.name === undefined ? undefined : this.constant(node.name)
    this.emit(node.loc, Op.PUSH_SCOPE)
    if (name !== undefined) {
      this.emit(node.loc, Op.DECLARE_NAME, name, bindingKinds.indexOf('const'))
    }
    if (node.superClass !== undefined) {
      this.expression(node.superClass)
    }
    this.emit(node.loc, Op.CLASS, this.constant(new ClassTemplate(node, members)), node.superClass === undefined ? 0 : 1)
    if (name !== undefined) {
      this.emit(node.loc, Op.DUP)
      this.emit(node.loc, Op.INIT_NAME, name, bindingKinds.indexOf('const'))
    }
    this.emit(node.loc, Op.POP_SCOPE)
  }

  private statement(stmt: Statement) {
    if (stmt instanceof ExpStatement) {
      this.expression(stmt.exp)
      this.emit(stmt.loc, this.isProgram ? Op.SET_COMPLETION : Op.POP)
    } else if (stmt instanceof VarDecl) {
      this.varDecl(stmt)
    } else if (stmt instanceof FunctionDecl || stmt instanceof Empty || stmt instanceof ExportNames) {
      // Hoisted, or nothing to do.
    } else if (stmt instanceof ClassDecl) {
      this.classDefinition(stmt.cls)
      this.initName(stmt.loc, stmt.name, 'class')
    } else if (stmt instanceof Block) {
      const entered = this.enterBlock(stmt.loc, stmt.body)
      this.statements(stmt.body)
      this.leaveBlock(stmt.loc, entered)
    } else if (stmt instanceof If) {
      this.expression(stmt.test)
      const elseJump = this.emit(stmt.loc, Op.JUMP_IF_FALSE, 0)
      this.statement(stmt.consequent)
      if (stmt.alternate === undefined) {
        this.patchHere([elseJump])
      } else {
        const endJump = this.emit(stmt.loc, Op.JUMP, 0)
        this.patchHere([elseJump])
        this.statement(stmt.alternate)
        this.patchHere([endJump])
      }
    } else if (stmt instanceof While) {
      const top = this.here
      this.expression(stmt.test)
      const exitJump = this.emit(stmt.loc, Op.JUMP_IF_FALSE, 0)
      const loop = this.loopBody(stmt.body)
      this.emit(stmt.loc, Op.JUMP, top)
      for (const offset of loop.continues) {
        this.chunk.patch(offset, top)
      }
      this.patchHere([exitJump, ...loop.breaks])
    } else if (stmt instanceof DoWhile) {
      const top = this.here
      const loop = this.loopBody(stmt.body)
      this.patchHere(loop.continues)
      this.expression(stmt.test)
      this.emit(stmt.loc, Op.JUMP_IF_TRUE, top)
      this.patchHere(loop.breaks)
    } else if (stmt instanceof For) {
      this.forLoop(stmt)
    } else if (stmt instanceof ForOf || stmt instanceof ForIn) {
      this.forEachLoop(stmt)
    } else if (stmt instanceof Switch) {
      this.switchStatement(stmt)
    } else if (stmt instanceof Try) {
      this.tryStatement(stmt)
    } else if (stmt instanceof Return) {
      if (stmt.argument === undefined) {
        this.emit(stmt.loc, Op.UNDEFINED)
      } else {
        this.expression(stmt.argument)
      }
      this.emitExits(stmt.loc, 0, false)
      this.emit(stmt.loc, Op.RETURN)
    } else if (stmt instanceof Break) {
      const index = this.innermost(['loop', 'switch'])
      const target = this.exits[index]
      if (index < 0 || (target.kind !== 'loop' && target.kind !== 'switch')) {
        throw new KiteInternalError('break outside a loop or switch')
      }
      this.emitExits(stmt.loc, index + 1, true)
      target.breaks.push(this.emit(stmt.loc, Op.JUMP, 0))
    } else if (stmt instanceof Continue) {
      const index = this.innermost(['loop'])
      const target = this.exits[index]
      if (index < 0 || target.kind !== 'loop') {
        throw new KiteInternalError('continue outside a loop')
      }
      this.emitExits(stmt.loc, index + 1, true)
      target.continues.push(this.emit(stmt.loc, Op.JUMP, 0))
    } else if (stmt instanceof Throw) {
      this.expression(stmt.argument)
      this.emit(stmt.loc, Op.THROW)
    } else if (stmt instanceof Import) {
      this.emit(stmt.loc, Op.IMPORT, this.constant(new ImportTemplate(stmt)))
    } else if (stmt instanceof ExportDecl) {
      this.statement(stmt.declaration)
    } else if (stmt instanceof ExportDefault) {
      if (stmt.value instanceof Exp) {
        this.expression(stmt.value)
        this.initName(stmt.loc, defaultExportName, 'const')
      } else {
        this.statement(stmt.value)
      }
    } else {
      throw new KiteInternalError(`Cannot compile ${stmt.constructor.name}`)
    }
  }

  // Expressions.

  private propertyKey(key: Exp, computed: boolean) {
    if (!computed && key instanceof Literal) {
      this.emit(key.loc, Op.CONST, this.constant(String(key.value)))
    } else {
      this.expression(key)
      this.emit(key.loc, Op.TO_KEY)
    }
  }

  // Leave the argument list on the stack: the values, or one array when
  // there is a spread. Returns the count, or undefined for an array.
  private args(args: Exp[]): number | undefined {
    if (!args.some((arg) => arg instanceof Spread)) {
      args.forEach((arg) => this.expression(arg))
      return args.length
    }
    this.emit(args[0].loc, Op.NEW_ARRAY, 0)
    this.arrayElements(args)
    return undefined
  }

  private arrayElements(elements: (Exp | null)[]) {
    for (const element of elements) {
      if (element === null) {
        continue
      } else if (element instanceof Spread) {
        this.expression(element.argument)
        this.emit(element.loc, Op.ARRAY_SPREAD, this.desc(element.argument))
      } else {
        this.expression(element)
        this.emit(element.loc, Op.ARRAY_PUSH)
      }
    }
  }

  private arrayLiteral(exp: ArrayLiteral) {
    const plain = exp.elements.flatMap((e) => (e === null || e instanceof Spread ? [] : [e]))
    if (plain.length === exp.elements.length) {
      plain.forEach((e) => this.expression(e))
      this.emit(exp.loc, Op.NEW_ARRAY, plain.length)
      return
    }
    this.emit(exp.loc, Op.NEW_ARRAY, 0)
    for (const element of exp.elements) {
      if (element === null) {
        this.emit(exp.loc, Op.UNDEFINED)
        this.emit(exp.loc, Op.ARRAY_PUSH)
      } else {
        this.arrayElements([element])
      }
    }
  }

  private objectLiteral(exp: ObjectLiteral) {
    this.emit(exp.loc, Op.NEW_OBJECT)
    for (const prop of exp.properties) {
      if (prop instanceof Spread) {
        this.expression(prop.argument)
        this.emit(prop.loc, Op.SPREAD_OBJECT)
      } else {
        this.propertyKey(prop.key, prop.computed)
        if (prop.kind !== 'init' && prop.value instanceof FunctionExp) {
          this.emit(prop.loc, Op.CLOSURE, this.constant(new FunctionTemplate(prop.value)), 0)
          this.emit(prop.loc, prop.kind === 'get' ? Op.DEFINE_GETTER : Op.DEFINE_SETTER)
        } else if (prop.value instanceof FunctionExp && prop.value.kind === 'method') {
          this.emit(prop.loc, Op.CLOSURE, this.constant(new FunctionTemplate(prop.value)), 0)
          this.emit(prop.loc, Op.DEFINE_METHOD)
        } else {
          this.expression(prop.value)
          this.emit(prop.loc, Op.DEFINE_PROP)
        }
      }
    }
  }

  private unary(exp: Unary) {
    const arg = exp.argument
    if (exp.op === 'typeof' && arg instanceof Identifier && this.slotFor(arg.name) === undefined) {
      this.emit(arg.loc, Op.TYPEOF_NAME, this.constant(arg.name))
      return
    } else if (exp.op === 'delete' && arg instanceof Member) {
      this.expression(arg.object)
      this.propertyKey(arg.property, arg.computed)
      this.emit(exp.loc, Op.DELETE_PROP)
      return
    }
    this.expression(arg)
    switch (exp.op) {
      case '!':
        this.emit(exp.loc, Op.NOT)
        break
      case '-':
        this.emit(exp.loc, Op.NEG)
        break
      case '+':
        this.emit(exp.loc, Op.TO_NUMBER)
        break
      case 'typeof':
        this.emit(exp.loc, Op.TYPEOF)
        break
      default:
        this.emit(exp.loc, Op.POP)
        this.emit(exp.loc, exp.op === 'void' ? Op.UNDEFINED : Op.TRUE)
    }
  }

  private update(exp: Update) {
    const step = exp.op === '++' ? Op.ADD : Op.SUB
    const one = this.constant(1)
    const target = exp.target
    if (target instanceof Identifier) {
      this.getName(exp.loc, target.name)
      this.emit(exp.loc, Op.TO_NUMBER)
      if (!exp.prefix) {
        this.emit(exp.loc, Op.DUP)
      }
      this.emit(exp.loc, Op.CONST, one)
      this.emit(exp.loc, step)
      this.setName(exp.loc, target.name)
      if (!exp.prefix) {
        this.emit(exp.loc, Op.POP)
      }
      return
    }
    this.expression(target.object)
    this.propertyKey(target.property, target.computed)
    this.emit(exp.loc, Op.DUP2)
    this.emit(exp.loc, Op.GET_PROP)
    this.emit(exp.loc, Op.TO_NUMBER)
    if (!exp.prefix) {
      this.emit(exp.loc, Op.DUP)
      this.emit(exp.loc, Op.ROT4)
    }
    this.emit(exp.loc, Op.CONST, one)
    this.emit(exp.loc, step)
    this.emit(exp.loc, Op.SET_PROP)
    if (!exp.prefix) {
      this.emit(exp.loc, Op.POP)
    }
  }

  private assign(exp: Assign) {
    const target = exp.target
    const op = compoundOps.get(exp.op)
    if (target instanceof Identifier) {
      if (op !== undefined) {
        this.getName(exp.loc, target.name)
      }
      this.expression(exp.value)
      if (op !== undefined) {
        this.emit(exp.loc, op)
      }
      this.setName(exp.loc, target.name)
    } else if (target instanceof Member) {
      this.expression(target.object)
      this.propertyKey(target.property, target.computed)
      if (op !== undefined) {
        this.emit(exp.loc, Op.DUP2)
        this.emit(exp.loc, Op.GET_PROP)
      }
      this.expression(exp.value)
      if (op !== undefined) {
        this.emit(exp.loc, op)
      }
      this.emit(exp.loc, Op.SET_PROP)
    } else {
      throw new KiteInternalError('Destructuring assignment in compiled code')
    }
  }

  private call(exp: Call) {
    const callee = exp.callee
    if (callee instanceof Member) {
      this.expression(callee.object)
      this.emit(callee.loc, Op.DUP)
      this.propertyKey(callee.property, callee.computed)
      this.emit(callee.loc, Op.GET_PROP)
      this.emit(callee.loc, Op.SWAP)
    } else {
      this.expression(callee)
      this.emit(exp.loc, Op.UNDEFINED)
    }
    const argc = this.args(exp.args)
    if (argc === undefined) {
      this.emit(exp.loc, Op.CALL_SPREAD, this.desc(callee))
    } else {
      this.emit(exp.loc, Op.CALL, argc, this.desc(callee))
    }
  }

  private expression(exp: Exp) {
    if (exp instanceof Literal) {
      const value = exp.value
      if (value === undefined) {
        this.emit(exp.loc, Op.UNDEFINED)
      } else if (value === null) {
        this.emit(exp.loc, Op.NULL)
      } else if (typeof value === 'boolean') {
        this.emit(exp.loc, value ? Op.TRUE : Op.FALSE)
      } else {
        this.emit(exp.loc, Op.CONST, this.constant(value))
      }
    } else if (exp instanceof Identifier) {
      this.getName(exp.loc, exp.name)
    } else if (exp instanceof TemplateLiteral) {
      this.emit(exp.loc, Op.CONST, this.constant(exp.quasis[0]))
      exp.exps.forEach((e, i) => {
        this.expression(e)
        this.emit(exp.loc, Op.TO_STRING)
        this.emit(exp.loc, Op.ADD)
        if (exp.quasis[i + 1] !== '') {
          this.emit(exp.loc, Op.CONST, this.constant(exp.quasis[i + 1]))
          this.emit(exp.loc, Op.ADD)
        }
      })
    } else if (exp instanceof ThisExp) {
      this.emit(exp.loc, Op.THIS)
    } else if (exp instanceof ArrayLiteral) {
      this.arrayLiteral(exp)
    } else if (exp instanceof ObjectLiteral) {
      this.objectLiteral(exp)
    } else if (exp instanceof FunctionExp) {
      this.emit(exp.loc, Op.CLOSURE, this.constant(new FunctionTemplate(exp)), 1)
    } else if (exp instanceof ClassExp) {
      this.classDefinition(exp)
    } else if (exp instanceof Unary) {
      this.unary(exp)
    } else if (exp instanceof Update) {
      this.update(exp)
    } else if (exp instanceof Binary) {
      const left = exp.left
      const right = exp.right
      if (left instanceof Literal && right instanceof Literal
        && typeof left.value === 'number' && typeof right.value === 'number') {
        const folded = foldNumbers(exp.op, left.value, right.value)
        if (folded !== undefined) {
          this.emit(exp.loc, Op.CONST, this.constant(folded))
          return
        }
      }
      const op = binaryOps.get(exp.op)
      if (op === undefined) {
        throw new KiteInternalError(`Unknown operator ${exp.op}`)
      }
      this.expression(left)
      this.expression(right)
      this.emit(exp.loc, op)
    } else if (exp instanceof Logical) {
      this.expression(exp.left)
      const jumpOp = exp.op === '&&' ? Op.JUMP_IF_FALSE_KEEP
        : exp.op === '||' ? Op.JUMP_IF_TRUE_KEEP : Op.JUMP_IF_NOT_NULLISH_KEEP
      const end = this.emit(exp.loc, jumpOp, 0)
      this.expression(exp.right)
      this.patchHere([end])
    } else if (exp instanceof Conditional) {
      this.expression(exp.test)
      const elseJump = this.emit(exp.loc, Op.JUMP_IF_FALSE, 0)
      this.expression(exp.consequent)
      const endJump = this.emit(exp.loc, Op.JUMP, 0)
      this.patchHere([elseJump])
      this.expression(exp.alternate)
      this.patchHere([endJump])
    } else if (exp instanceof Sequence) {
      exp.expressions.forEach((e, i) => {
        this.expression(e)
        if (i < exp.expressions.length - 1) {
          this.emit(e.loc, Op.POP)
        }
      })
    } else if (exp instanceof Assign) {
      this.assign(exp)
    } else if (exp instanceof Member) {
      this.expression(exp.object)
      this.propertyKey(exp.property, exp.computed)
      this.emit(exp.loc, Op.GET_PROP)
    } else if (exp instanceof Call) {
      this.call(exp)
    } else if (exp instanceof New) {
      this.expression(exp.callee)
      const argc = this.args(exp.args)
      if (argc === undefined) {
        this.emit(exp.loc, Op.NEW_SPREAD, this.desc(exp.callee))
      } else {
        this.emit(exp.loc, Op.NEW, argc, this.desc(exp.callee))
      }
    } else {
      throw new KiteInternalError(`Cannot compile ${exp.constructor.name}`)
    }
  }
}

class ProgramCompiler {
  readonly bodies = new Map<FunctionExp, FunctionBody>()

  constructor(readonly file: string) {}

  compileMain(program: Program): ProgramBody {
    const scan = scanOwnCode(program.body)
    let main: ProgramBody
    if (scan.bridgeReason !== undefined) {
      main = {kind: 'bridged', reason: scan.bridgeReason}
    } else {
      const compiler = new FunctionCompiler(new Chunk('<main>', this.file, false), true)
      compiler.compileProgram(program)
      main = {kind: 'compiled', chunk: compiler.chunk}
    }
    scan.nested.forEach((fn) => this.compileFunction(fn))
    return main
  }

  // Functions with no closures of their own keep their locals in slots.
  compileFunction(node: FunctionExp) {
    const scan = scanOwnCode(children(node))
    const reason = node.isAsync ? 'async function' : scan.bridgeReason
    const name = node.name ?? node.inferredName ?? '(anonymous)'
    if (reason !== undefined) {
      this.bodies.set(node, {kind: 'bridged', node, reason})
    } else {
      const usesSlots = scan.nested.length === 0
      const compiler = new FunctionCompiler(new Chunk(name, this.file, usesSlots), false)
      compiler.compileFunction(node)
      this.bodies.set(node, {kind: 'compiled', node, chunk: compiler.chunk})
    }
    trace(`compiled ${name}`, this.bodies.get(node)?.kind)
    scan.nested.forEach((fn) => this.compileFunction(fn))
  }
}

export function compileProgram(program: Program): CompiledProgram {
  const compiler = new ProgramCompiler(program.file)
  const main = compiler.compileMain(program)
  return {program, main, bodies: compiler.bodies}
}

// A listing of every chunk in the program, the main program first.
export function disassemble(compiled: CompiledProgram): string {
  const sections: string[] = []
  const section = (title: string, body: ProgramBody) => {
    if (body.kind === 'bridged') {
      sections.push(`== ${title} (bridged: ${body.reason}) ==`)
    } else {
      sections.push(`== ${title} ==\n${disassembleChunk(body.chunk)}`)
    }
  }
  section('<main>', compiled.main)
  for (const [node, body] of compiled.bodies) {
    const title = node.name ?? node.inferredName ?? '(anonymous)'
    if (body.kind === 'compiled') {
      section(title, {kind: 'compiled', chunk: body.chunk})
    } else if (body.kind === 'bridged') {
      section(title, {kind: 'bridged', reason: body.reason})
    }
  }
  return sections.join('\n\n')
}
