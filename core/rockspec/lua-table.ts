/**
 * Lua literal evaluation
 *
 * Rockspecs and manifests are Lua chunks made of assignments of literal
 * data. They are parsed with luaparse and evaluated here without running
 * any code: only literals, table constructors, `..` concatenation, unary
 * minus and references to names assigned earlier are accepted.
 *
 * @module core/rockspec/lua-table
 */

import luaparse from 'luaparse'
import type { Expression, Statement } from 'luaparse'
import { ParseError } from '../errors/index.js'

// =============================================================================
// Values
// =============================================================================

export type LuaValue = string | number | boolean | LuaTable

export type LuaKey = string | number

/**
 * A Lua table. Positional fields are stored under integer keys from 1.
 */
export class LuaTable {
  readonly entries = new Map<LuaKey, LuaValue>()

  get(key: LuaKey): LuaValue | undefined {
    return this.entries.get(key)
  }

  set(key: LuaKey, value: LuaValue | undefined): void {
    if (value === undefined) {
      this.entries.delete(key)
    } else {
      this.entries.set(key, value)
    }
  }

  /** Values at 1..n, stopping at the first gap */
  list(): LuaValue[] {
    const out: LuaValue[] = []
    for (let i = 1; ; i++) {
      const value = this.entries.get(i)
      if (value === undefined) return out
      out.push(value)
    }
  }

  /** Entries with string keys, in insertion order */
  fields(): [string, LuaValue][] {
    const out: [string, LuaValue][] = []
    for (const [key, value] of this.entries) {
      if (typeof key === 'string') out.push([key, value])
    }
    return out
  }

  get isList(): boolean {
    return this.entries.size === this.list().length
  }

  static from(record: Record<string, LuaValue>): LuaTable {
    const table = new LuaTable()
    for (const [key, value] of Object.entries(record)) {
      table.set(key, value)
    }
    return table
  }
}

export function isTable(value: LuaValue | undefined): value is LuaTable {
  return value instanceof LuaTable
}

// =============================================================================
// Evaluation
// =============================================================================

/**
 * Evaluate a chunk of top-level assignments and return the globals it set
 */
export function evaluateLua(source: string, path?: string): LuaTable {
  let body: Statement[]
  try {
    body = luaparse.parse(source, { luaVersion: '5.3', comments: false, ranges: true }).body
  } catch (error) {
    throw new ParseError(syntaxMessage(error), { offset: syntaxOffset(error), path })
  }

  const globals = new LuaTable()
  const locals = new Map<string, LuaValue | undefined>()
  const evaluator = new Evaluator(globals, locals, path)

  for (const statement of body) {
    evaluator.statement(statement)
  }
  return globals
}

class Evaluator {
  constructor(
    private readonly globals: LuaTable,
    private readonly locals: Map<string, LuaValue | undefined>,
    private readonly path: string | undefined
  ) {}

  statement(statement: Statement): void {
    switch (statement.type) {
      case 'AssignmentStatement': {
        const values = statement.init.map((e) => this.expression(e))
        statement.variables.forEach((target, i) => this.assign(target, values[i]))
        return
      }
      case 'LocalStatement': {
        statement.variables.forEach((id, i) => {
          const init = statement.init[i]
          this.locals.set(id.name, init ? this.expression(init) : undefined)
        })
        return
      }
      default:
        throw this.unsupported(statement.type, statement)
    }
  }

  private assign(target: Expression, value: LuaValue | undefined): void {
    switch (target.type) {
      case 'Identifier':
        if (this.locals.has(target.name)) {
          this.locals.set(target.name, value)
        } else {
          this.globals.set(target.name, value)
        }
        return
      case 'MemberExpression': {
        const base = this.tableOf(target.base)
        base.set(target.identifier.name, value)
        return
      }
      case 'IndexExpression': {
        const base = this.tableOf(target.base)
        base.set(this.key(target.index), value)
        return
      }
      default:
        throw this.unsupported(`assignment to ${target.type}`, target)
    }
  }

  expression(expr: Expression): LuaValue | undefined {
    switch (expr.type) {
      case 'StringLiteral':
        return decodeLuaString(expr.raw)
      case 'NumericLiteral':
        return expr.value
      case 'BooleanLiteral':
        return expr.value
      case 'NilLiteral':
        return undefined
      case 'Identifier':
        return this.locals.has(expr.name) ? this.locals.get(expr.name) : this.globals.get(expr.name)
      case 'TableConstructorExpression':
        return this.table(expr)
      case 'BinaryExpression': {
        if (expr.operator !== '..') {
          throw this.unsupported(`operator ${expr.operator}`, expr)
        }
        const left = this.expression(expr.left)
        const right = this.expression(expr.right)
        if (!isConcatenable(left) || !isConcatenable(right)) {
          throw this.error('attempt to concatenate a non-string value', expr)
        }
        return `${left}${right}`
      }
      case 'UnaryExpression': {
        const value = this.expression(expr.argument)
        if (expr.operator === '-' && typeof value === 'number') {
          return -value
        }
        throw this.unsupported(`unary ${expr.operator}`, expr)
      }
      case 'MemberExpression': {
        const base = this.expression(expr.base)
        return isTable(base) ? base.get(expr.identifier.name) : undefined
      }
      case 'IndexExpression': {
        const base = this.expression(expr.base)
        return isTable(base) ? base.get(this.key(expr.index)) : undefined
      }
      default:
        throw this.unsupported(expr.type, expr)
    }
  }

  private table(expr: Extract<Expression, { type: 'TableConstructorExpression' }>): LuaTable {
    const table = new LuaTable()
    let position = 1
    for (const field of expr.fields) {
      switch (field.type) {
        case 'TableValue':
          table.set(position++, this.expression(field.value))
          break
        case 'TableKeyString':
          table.set(field.key.name, this.expression(field.value))
          break
        case 'TableKey':
          table.set(this.key(field.key), this.expression(field.value))
          break
      }
    }
    return table
  }

  private key(expr: Expression): LuaKey {
    const key = this.expression(expr)
    if (typeof key === 'string' || typeof key === 'number') {
      return key
    }
    throw this.error('table keys must be strings or numbers', expr)
  }

  private tableOf(expr: Expression): LuaTable {
    const value = this.expression(expr)
    if (isTable(value)) return value
    throw this.error('attempt to index a non-table value', expr)
  }

  private unsupported(what: string, node: object): ParseError {
    return this.error(`unsupported construct: ${what}`, node)
  }

  private error(reason: string, node: object): ParseError {
    return new ParseError(reason, { offset: nodeOffset(node), path: this.path })
  }
}

function nodeOffset(node: object): number | undefined {
  if ('range' in node && Array.isArray(node.range) && typeof node.range[0] === 'number') {
    return node.range[0]
  }
  return undefined
}

function isConcatenable(value: LuaValue | undefined): value is string | number {
  return typeof value === 'string' || typeof value === 'number'
}

// =============================================================================
// Strings
// =============================================================================

const SIMPLE_ESCAPES: Record<string, string> = {
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
  '\\': '\\',
  '"': '"',
  "'": "'",
  '\n': '\n',
}

/**
 * Decode the raw source text of a Lua string literal (quoted or long bracket)
 */
export function decodeLuaString(raw: string): string {
  const long = /^\[(=*)\[\n?([\s\S]*)\]\1\]$/.exec(raw)
  if (long) {
    return long[2]
  }

  const body = raw.slice(1, -1)
  let out = ''
  for (let i = 0; i < body.length; i++) {
    const ch = body[i]
    if (ch !== '\\') {
      out += ch
      continue
    }
    const next = body[++i]
    if (next in SIMPLE_ESCAPES) {
      out += SIMPLE_ESCAPES[next]
    } else if (next === 'x') {
      out += String.fromCharCode(parseInt(body.slice(i + 1, i + 3), 16))
      i += 2
    } else if (next === 'z') {
      while (i + 1 < body.length && /\s/.test(body[i + 1])) i++
    } else if (next === 'u') {
      const close = body.indexOf('}', i)
      out += String.fromCodePoint(parseInt(body.slice(i + 2, close), 16))
      i = close
    } else if (/\d/.test(next)) {
      const digits = /^\d{1,3}/.exec(body.slice(i))?.[0] ?? next
      out += String.fromCharCode(Number(digits))
      i += digits.length - 1
    } else {
      out += next
    }
  }
  return out
}

function syntaxMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function syntaxOffset(error: unknown): number | undefined {
  if (error instanceof Error && 'index' in error && typeof error.index === 'number') {
    return error.index
  }
  return undefined
}
