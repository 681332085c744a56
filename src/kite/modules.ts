// Kite module loading.
// © Reuben Thomas 2023-2025
// Released under the MIT license.

import path from 'path'
import fs from 'fs-extra'

import {
  ClassDecl, ExportDecl, ExportDefault, ExportNames, FunctionDecl, Program, boundNames,
  defaultExportName,
} from './ast.js'
import {KiteNamespace, KiteVal} from './data.js'
import {Scope} from './environment.js'
import {KiteLexError, KiteLoadError, KiteParseError} from './error.js'
import {parse} from './parser.js'
import type {Realm} from './realm.js'
import {trace} from './util.js'

export interface ModuleSource {
  // Canonical path: modules with the same path are loaded once.
  path: string
  source: string
}

export type ModuleLoader = (specifier: string, importerPath: string) => ModuleSource

function isRelative(specifier: string) {
  return specifier.startsWith('./') || specifier.startsWith('../') || path.isAbsolute(specifier)
}

// Read relative specifiers from the file system, resolving them against the
// importing file's directory. `.js` is added when there is no extension.
export const fileLoader: ModuleLoader = (specifier, importerPath) => {
  if (!isRelative(specifier)) {
    throw new KiteLoadError(
      'file-not-found',
      specifier,
      `Cannot find module '${specifier}' imported from ${importerPath}: only relative imports are supported`,
    )
  }
  let modulePath = path.resolve(path.dirname(importerPath), specifier)
  if (path.extname(modulePath) === '') {
    modulePath += '.js'
  }
  let source: string
  try {
    source = fs.readFileSync(modulePath, 'utf-8')
  } catch (e) {
    throw new KiteLoadError(
      'file-not-found',
      specifier,
      `Cannot find module '${modulePath}' imported from ${importerPath}`,
      {cause: e},
    )
  }
  return {path: modulePath, source}
}

// Exported name to local binding name, read from the module's declarations.
export function exportMap(program: Program): Map<string, string> {
  const exports = new Map<string, string>()
  for (const stmt of program.body) {
    if (stmt instanceof ExportDecl) {
      const decl = stmt.declaration
      const names = decl instanceof FunctionDecl || decl instanceof ClassDecl
        ? [decl.name]
        : decl.declarations.flatMap((d) => boundNames(d.target))
      for (const name of names) {
        exports.set(name, name)
      }
    } else if (stmt instanceof ExportDefault) {
      const value = stmt.value
      exports.set('default', value instanceof FunctionDecl || value instanceof ClassDecl ? value.name : defaultExportName)
    } else if (stmt instanceof ExportNames) {
      for (const spec of stmt.specifiers) {
        exports.set(spec.exported, spec.local)
      }
    }
  }
  return exports
}

interface ModuleRecord {
  namespace: KiteNamespace
  evaluating: boolean
}

// Runs a parsed module body in its scope, with the engine's strategy.
export type ModuleRunner = (program: Program, scope: Scope) => KiteVal

// The modules of one evaluation, each loaded and run once.
export class ModuleGraph {
  private modules = new Map<string, ModuleRecord>()

  constructor(
    private readonly realm: Realm,
    private readonly loader: ModuleLoader,
    private readonly runner: ModuleRunner,
  ) {
    realm.importModule = (specifier, importer) => this.import(specifier, importer)
  }

  // Record the main program, so that importing it is seen as a cycle.
  addMain(program: Program, scope: Scope) {
    this.modules.set(path.resolve(program.file), {
      namespace: new KiteNamespace(program.file, scope, exportMap(program)),
      evaluating: true,
    })
  }

  import(specifier: string, importer: string): KiteNamespace {
    const {path: modulePath, source} = this.loader(specifier, importer)
    const existing = this.modules.get(modulePath)
    if (existing !== undefined) {
      if (existing.evaluating) {
        // Not fatal: the importer sees the partly initialized namespace.
        this.realm.diagnostic({
          kind: 'CircularImport',
          message: `circular import detected for '${modulePath}' (imported from ${importer})`,
        })
      }
      return existing.namespace
    }
    let program: Program
    try {
      program = parse(source, {file: modulePath, module: true})
    } catch (e) {
      if (e instanceof KiteLexError || e instanceof KiteParseError) {
        throw new KiteLoadError('parse-error', specifier, `Cannot load module '${modulePath}': ${e.message}`, {cause: e})
      }
      throw e
    }
    const scope = new Scope(this.realm.global)
    const record: ModuleRecord = {
      namespace: new KiteNamespace(modulePath, scope, exportMap(program)),
      evaluating: true,
    }
    this.modules.set(modulePath, record)
    trace(`loading ${modulePath}`, [...record.namespace.exportNames.keys()])
    try {
      this.runner(program, scope)
    } finally {
      record.evaluating = false
    }
    return record.namespace
  }
}
