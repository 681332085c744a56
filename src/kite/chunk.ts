// Kite bytecode: opcodes, chunks and disassembly.
// © Reuben Thomas 2023-2025
// Released under the MIT license.

import type {ClassExp, FunctionExp, Import, LiteralValue, PropertyKind} from './ast.js'
import {quote} from './display.js'
import type {BindingKind} from './environment.js'
import {SourceLoc} from './error.js'
import {numberToString} from './operators.js'

export enum Op {
  CONST, UNDEFINED, NULL, TRUE, FALSE,
  // ROT3 brings the third item up to the top; ROT4 sinks the top item
  // below the next three.
  POP, DUP, DUP2, SWAP, ROT3, ROT4,
  GET_LOCAL, SET_LOCAL, INIT_LOCAL, DECLARE_LOCAL,
  GET_NAME, SET_NAME, INIT_NAME, DECLARE_NAME, DECLARE_FUNCTION, TYPEOF_NAME,
  PUSH_SCOPE, POP_SCOPE, COPY_SCOPE,
  THIS,
  GET_PROP, SET_PROP, DELETE_PROP, TO_KEY,
  NEW_OBJECT, DEFINE_PROP, DEFINE_METHOD, DEFINE_GETTER, DEFINE_SETTER, SPREAD_OBJECT,
  NEW_ARRAY, ARRAY_PUSH, ARRAY_SPREAD,
  CLOSURE, CLASS,
  ADD, SUB, MUL, DIV, MOD, POW,
  EQ, NE, STRICT_EQ, STRICT_NE, LT, GT, LE, GE, INSTANCEOF, IN,
  NOT, NEG, TO_NUMBER, TO_STRING, TYPEOF,
  JUMP, JUMP_IF_FALSE, JUMP_IF_TRUE,
  JUMP_IF_FALSE_KEEP, JUMP_IF_TRUE_KEEP, JUMP_IF_NOT_NULLISH_KEEP, JUMP_IF_NOT_UNDEFINED,
  CALL, CALL_SPREAD, NEW, NEW_SPREAD, RETURN, THROW,
  // A TRY_FINALLY handler catches host errors too, and its code ends with
  // RETHROW.
  TRY, TRY_FINALLY, END_TRY, RETHROW,
  ITER_START, ITER_KEYS, ITER_NEXT, ITER_END,
  IMPORT, SET_COMPLETION, GET_COMPLETION,
  NOP,
}

// A function expression to be turned into a closure; its body is found
// through the compiled program's body table.
export class FunctionTemplate {
  constructor(public readonly node: FunctionExp) {}
}

export interface ClassMemberTemplate {
  key: string
  isStatic: boolean
  kind: PropertyKind
  fn: FunctionExp
}

export class ClassTemplate {
  constructor(public readonly node: ClassExp, public readonly members: ClassMemberTemplate[]) {}
}

export class ImportTemplate {
  constructor(public readonly stmt: Import) {}
}

export type Constant = LiteralValue | FunctionTemplate | ClassTemplate | ImportTemplate

// Binding kinds as they are encoded in DECLARE_NAME and INIT_NAME.
export const bindingKinds: readonly BindingKind[] = ['var', 'let', 'const', 'function', 'class', 'param', 'import']

type OperandKind = 'const' | 'slot' | 'kind' | 'target' | 'count' | 'flag' | 'desc'

const operandKinds = new Map<Op, OperandKind[]>([
  [Op.CONST, ['const']],
  [Op.GET_LOCAL, ['slot']],
  [Op.SET_LOCAL, ['slot']],
  [Op.INIT_LOCAL, ['slot']],
  [Op.DECLARE_LOCAL, ['slot']],
  [Op.GET_NAME, ['const']],
  [Op.SET_NAME, ['const']],
  [Op.INIT_NAME, ['const', 'kind']],
  [Op.DECLARE_NAME, ['const', 'kind']],
  [Op.DECLARE_FUNCTION, ['const', 'const']],
  [Op.TYPEOF_NAME, ['const']],
  [Op.NEW_ARRAY, ['count']],
  [Op.ARRAY_SPREAD, ['desc']],
  [Op.CLOSURE, ['const', 'flag']],
  [Op.CLASS, ['const', 'flag']],
  [Op.JUMP, ['target']],
  [Op.JUMP_IF_FALSE, ['target']],
  [Op.JUMP_IF_TRUE, ['target']],
  [Op.JUMP_IF_FALSE_KEEP, ['target']],
  [Op.JUMP_IF_TRUE_KEEP, ['target']],
  [Op.JUMP_IF_NOT_NULLISH_KEEP, ['target']],
  [Op.JUMP_IF_NOT_UNDEFINED, ['target']],
  [Op.CALL, ['count', 'desc']],
  [Op.CALL_SPREAD, ['desc']],
  [Op.NEW, ['count', 'desc']],
  [Op.NEW_SPREAD, ['desc']],
  [Op.TRY, ['target']],
  [Op.TRY_FINALLY, ['target']],
  [Op.ITER_START, ['desc']],
  [Op.ITER_NEXT, ['target']],
  [Op.IMPORT, ['const']],
])

export function operandCount(op: Op) {
  return operandKinds.get(op)?.length ?? 0
}

const terminators = new Set([Op.JUMP, Op.RETURN, Op.THROW, Op.RETHROW])

export class Chunk {
  code: number[] = []

  constants: Constant[] = []

  // Source position of each code offset, operands included.
  lines: number[] = []

  columns: number[] = []

  // Local slots, used only when usesSlots is set.
  slotNames: string[] = []

  slotKinds: BindingKind[] = []

  params: string[] = []

  restParam?: string

  constructor(
    public readonly name: string,
    public readonly file: string,
    public readonly usesSlots: boolean,
  ) {}

  // Append an instruction, returning its offset.
  emit(loc: SourceLoc, op: Op, ...operands: number[]): number {
    const offset = this.code.length
    for (const word of [op, ...operands]) {
      this.code.push(word)
      this.lines.push(loc.line)
      this.columns.push(loc.column)
    }
    return offset
  }

  // Set the first operand of the instruction at `offset`.
  patch(offset: number, value: number) {
    this.code[offset + 1] = value
  }

  addConstant(value: Constant): number {
    if (!(value instanceof Object)) {
      const index = this.constants.findIndex((c) => Object.is(c, value))
      if (index >= 0) {
        return index
      }
    }
    this.constants.push(value)
    return this.constants.length - 1
  }

  addSlot(name: string, kind: BindingKind): number {
    this.slotNames.push(name)
    this.slotKinds.push(kind)
    return this.slotNames.length - 1
  }
}

// Replace instructions that follow a jump, return or throw and that no jump
// or handler reaches with NOPs.
export function eliminateDeadCode(chunk: Chunk) {
  const code = chunk.code
  const targets = new Set<number>()
  for (let ip = 0; ip < code.length; ip += 1 + operandCount(code[ip])) {
    const kinds = operandKinds.get(code[ip])
    if (kinds?.[0] === 'target') {
      targets.add(code[ip + 1])
    }
  }
  let reachable = true
  for (let ip = 0; ip < code.length;) {
    const op: Op = code[ip]
    const width = 1 + operandCount(op)
    if (targets.has(ip)) {
      reachable = true
    }
    if (!reachable) {
      code.fill(Op.NOP, ip, ip + width)
    } else if (terminators.has(op)) {
      reachable = false
    }
    ip += width
  }
}

export function formatConstant(value: Constant): string {
  if (value instanceof FunctionTemplate) {
    return `<function ${value.node.name ?? value.node.inferredName ?? '(anonymous)'}>`
  } else if (value instanceof ClassTemplate) {
    return `<class ${value.node.name ?? value.node.inferredName ?? '(anonymous)'}>`
  } else if (value instanceof ImportTemplate) {
    return `<import ${quote(value.stmt.source)}>`
  } else if (typeof value === 'string') {
    return quote(value)
  } else if (typeof value === 'number') {
    return Object.is(value, -0) ? '-0' : numberToString(value)
  }
  return String(value)
}

function formatOperand(chunk: Chunk, kind: OperandKind, operand: number) {
  switch (kind) {
    case 'const':
      return `${operand} (${formatConstant(chunk.constants[operand])})`
    case 'slot':
      return `${operand} (${chunk.slotNames[operand]})`
    case 'kind':
      return bindingKinds[operand]
    case 'target':
      return `-> ${String(operand).padStart(4, '0')}`
    case 'desc':
      return operand < 0 ? '-' : formatConstant(chunk.constants[operand])
    default:
      return String(operand)
  }
}

// One line per instruction: offset, source position (or `|` when it is
// the same as the previous instruction's), opcode and operands; then the
// constant pool.
export function disassembleChunk(chunk: Chunk): string {
  const lines: string[] = []
  let prevPos = ''
  for (let ip = 0; ip < chunk.code.length;) {
    const op: Op = chunk.code[ip]
    const kinds = operandKinds.get(op) ?? []
    const pos = `${chunk.lines[ip]}:${chunk.columns[ip]}`
    const operands = kinds.map((kind, i) => formatOperand(chunk, kind, chunk.code[ip + 1 + i]))
    lines.push([
      String(ip).padStart(4, '0'),
      (pos === prevPos ? '|' : pos).padStart(7),
      Op[op] ?? `UNKNOWN(${op})`,
      ...operands,
    ].join(' '))
    prevPos = pos
    ip += 1 + kinds.length
  }
  if (chunk.constants.length > 0) {
    lines.push('-- constants --')
    chunk.constants.forEach((value, i) => lines.push(`${String(i).padStart(4, '0')} ${formatConstant(value)}`))
  }
  return lines.join('\n')
}
