import path from 'path'

import fs from 'fs-extra'
import tmp from 'tmp'
import test, {ExecutionContext} from 'ava'

import {evaluate} from './engine.js'
import {ModuleLoader} from './modules.js'
import {errorLine, runBoth} from '../testutil.js'

// Write `files` into a fresh directory, returning its path.
function moduleTree(t: ExecutionContext, files: Record<string, string>) {
  const dir = tmp.dirSync({unsafeCleanup: true})
  t.teardown(() => dir.removeCallback())
  for (const [name, source] of Object.entries(files)) {
    fs.outputFileSync(path.join(dir.name, name), source)
  }
  return dir.name
}

function runMain(t: ExecutionContext, dir: string) {
  const mainPath = path.join(dir, 'main.js')
  return runBoth(t, fs.readFileSync(mainPath, 'utf-8'), {fileName: mainPath})
}

test('Named, default and namespace imports', (t) => {
  const dir = moduleTree(t, {
    'main.js': 'import {add, name} from "./lib.js"\nimport helper from "./util/helper"\nimport * as lib from "./lib.js"\nprint(add(1, 2), name, helper(), lib.name)',
    'lib.js': 'export function add(a, b) { return a + b }\nexport const name = "lib"',
    'util/helper.js': 'export default () => "helped"',
  })
  const result = runMain(t, dir)
  t.is(result.error, undefined)
  t.deepEqual(result.output, ['3 lib helped lib'])
})

test('A module is evaluated once', (t) => {
  const dir = moduleTree(t, {
    'main.js': 'import {a} from "./a.js"\nimport * as counter from "./counter.js"\ncounter.bump()\nprint(a, counter.count)',
    'a.js': 'import {bump} from "./counter.js"\nbump()\nexport const a = 1',
    'counter.js': 'print("loading counter")\nexport let count = 0\nexport function bump() { count += 1 }',
  })
  t.deepEqual(runMain(t, dir).output, ['loading counter', '1 2'])
})

test('Export lists rename bindings', (t) => {
  const dir = moduleTree(t, {
    'main.js': 'import {visible as v} from "./lib.js"\nprint(v)',
    'lib.js': 'const hidden = "shown"\nexport {hidden as visible}',
  })
  t.deepEqual(runMain(t, dir).output, ['shown'])
})

test('A circular import is reported and does not recurse', (t) => {
  const dir = moduleTree(t, {
    'main.js': 'import {b, seen} from "./b.js"\nexport const fromMain = 1\nprint(b, seen)',
    'b.js': 'import {fromMain} from "./main.js"\nexport const seen = typeof fromMain\nexport const b = "b"',
  })
  const result = runMain(t, dir)
  t.is(result.error, undefined)
  t.deepEqual(result.output, ['b undefined'])
  t.deepEqual(result.diagnostics, [{
    kind: 'CircularImport',
    message: `circular import detected for '${path.join(dir, 'main.js')}' (imported from ${path.join(dir, 'b.js')})`,
  }])
})

test('A missing module is a load error at the import', (t) => {
  const dir = moduleTree(t, {'main.js': '\nimport {x} from "./missing.js"'})
  const {error} = runMain(t, dir)
  t.deepEqual(error, {
    kind: 'LoadError',
    message: `Cannot find module '${path.join(dir, 'missing.js')}' imported from ${path.join(dir, 'main.js')}`,
    file: path.join(dir, 'main.js'),
    line: 2,
    column: 1,
    stack: [],
  })
})

test('Only relative imports are supported', (t) => {
  const dir = moduleTree(t, {'main.js': 'import x from "some-package"'})
  t.is(
    errorLine(runMain(t, dir)),
    `LoadError: Cannot find module 'some-package' imported from ${path.join(dir, 'main.js')}: only relative imports are supported`,
  )
})

test('A syntax error in an imported module is a load error', (t) => {
  const dir = moduleTree(t, {
    'main.js': 'import {x} from "./bad.js"',
    'bad.js': 'export let = 1',
  })
  const badPath = path.join(dir, 'bad.js')
  t.is(
    errorLine(runMain(t, dir)),
    `LoadError: Cannot load module '${badPath}': ${badPath}:1:12: Expected binding name but found '='`,
  )
})

test('Importing a name that is not exported', (t) => {
  const dir = moduleTree(t, {
    'main.js': 'import {nope} from "./lib.js"',
    'lib.js': 'export const yes = 1',
  })
  t.is(errorLine(runMain(t, dir)), "SyntaxError: The requested module './lib.js' does not provide an export named 'nope'")
})

test('Modules can come from a custom loader', (t) => {
  const sources = new Map([['/virtual/answer', 'export const v = 42']])
  const loader: ModuleLoader = (specifier) => {
    const modulePath = `/virtual/${specifier}`
    const source = sources.get(modulePath)
    if (source === undefined) {
      throw new Error(`no module ${specifier}`)
    }
    return {path: modulePath, source}
  }
  const result = evaluate('import {v} from "answer"\nprint(v + 1)', {loader})
  t.deepEqual(result.output, ['43'])
})
