/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import { describe, it, before, after } from 'node:test'
import assert from 'node:assert/strict'
import fs from 'node:fs/promises'
import os from 'node:os'
import path_ from 'node:path'
import Patcher from '../lib/launcher/loaders/patcher'
import utils from '../lib/utils/utils'
import { KilnError } from '../types/errors'
import type { FullConfig } from '../types/config'
import type { ProcessorStep, VersionDescriptor } from '../types/manifest'
import { makeConfig, makeDescriptor } from './helpers/fixtures'
import { buildJar, canFakeJava, readCalls, writeFakeJava } from './helpers/java'

describe('Patcher', () => {
  let root: string
  let javaPath: string
  let log: string
  let config: FullConfig

  const lib = (coordinate: string) => path_.join(root, 'libraries', utils.getLibraryPath(coordinate))

  const descriptorWith = (processors: ProcessorStep[]): VersionDescriptor =>
    makeDescriptor({
      data: {
        OUTPUT: { client: '[net.example:output:1.0@txt]', server: '' },
        NAME: { client: "'hello world'", server: '' },
        SIDE: { client: 'client', server: 'server' }
      },
      processors: processors
    })

  before(async () => {
    root = await fs.mkdtemp(path_.join(os.tmpdir(), 'kiln-patcher-'))
    const fake = await writeFakeJava(path_.join(root, 'bin'))
    javaPath = fake.java
    log = fake.log

    config = makeConfig(root, 'http://127.0.0.1:1', { type: 'VANILLA' }, 'patched')

    const jars: Record<string, string> = {
      'net.example:proc:1.0': 'Manifest-Version: 1.0\r\nMain-Class: net.example.Proc\r\n',
      'net.example:dep:1.0': 'Manifest-Version: 1.0\r\n',
      'net.example:broken:1.0': 'Manifest-Version: 1.0\r\nCreated-By: test\r\n'
    }
    for (const [coordinate, manifest] of Object.entries(jars)) {
      await fs.mkdir(path_.dirname(lib(coordinate)), { recursive: true })
      await fs.writeFile(lib(coordinate), buildJar(manifest))
    }
  })

  after(async () => {
    await fs.rm(root, { recursive: true, force: true })
  })

  it('resolves the arguments and runs the client processors', async (t) => {
    if (!canFakeJava) return t.skip('no POSIX shell')
    await fs.rm(log, { force: true })
    const descriptor = descriptorWith([
      {
        jar: 'net.example:proc:1.0',
        classpath: ['net.example:dep:1.0'],
        args: ['--out', '{OUTPUT}', '--name', '{NAME}', '--side', '{SIDE}', '--raw', '{MISSING}', '[net.example:lib:2.0]']
      },
      { jar: 'net.example:proc:1.0', classpath: [], args: ['--server'], sides: ['server'] }
    ])
    const patcher = new Patcher(config, javaPath)
    const skipped: string[] = []
    patcher.on('patch_skip', (e) => skipped.push(e.reason))

    assert.equal(await patcher.patch(descriptor), 1)
    assert.deepEqual(skipped, ['side'])
    assert.deepEqual(await readCalls(log), [
      [
        '-cp',
        [lib('net.example:dep:1.0'), lib('net.example:proc:1.0')].join(path_.delimiter),
        'net.example.Proc',
        '--out',
        path_.join(root, 'libraries', 'net', 'example', 'output', '1.0', 'output-1.0.txt'),
        '--name',
        'hello world',
        '--side',
        'client',
        '--raw',
        '{MISSING}',
        path_.join(root, 'libraries', 'net', 'example', 'lib', '2.0', 'lib-2.0.jar')
      ]
    ])

    const saved = await utils.readJson<VersionDescriptor>(path_.join(root, 'versions', 'patched', 'patched.json'))
    assert.equal(saved.processors?.[0].success, true)
    assert.equal(saved.processors?.[1].success, undefined)
  })

  it('does not run the processors that already succeeded', async (t) => {
    if (!canFakeJava) return t.skip('no POSIX shell')
    await fs.rm(log, { force: true })
    const descriptor = descriptorWith([
      { jar: 'net.example:proc:1.0', classpath: [], args: ['--first'], success: true },
      { jar: 'net.example:proc:1.0', classpath: [], args: ['--second'] }
    ])
    const patcher = new Patcher(config, javaPath)
    const skipped: string[] = []
    patcher.on('patch_skip', (e) => skipped.push(e.reason))

    assert.equal(await patcher.patch(descriptor), 1)
    assert.equal(await patcher.patch(descriptor), 0)
    assert.deepEqual(skipped, ['done', 'done', 'done'])
    assert.deepEqual(await readCalls(log), [['-cp', lib('net.example:proc:1.0'), 'net.example.Proc', '--second']])
  })

  it('saves the progress and fails when a processor fails', async (t) => {
    if (!canFakeJava) return t.skip('no POSIX shell')
    const descriptor = descriptorWith([
      { jar: 'net.example:proc:1.0', classpath: [], args: ['--ok'] },
      { jar: 'net.example:proc:1.0', classpath: [], args: ['FAIL'] },
      { jar: 'net.example:proc:1.0', classpath: [], args: ['--never'] }
    ])

    await assert.rejects(new Patcher(config, javaPath).patch(descriptor), (err: unknown) => {
      assert.ok(err instanceof KilnError)
      assert.equal(err.code, 'PROCESSOR_ERROR')
      assert.equal(err.message, 'Processor net.example:proc:1.0 exited with code 3: processor failed')
      return true
    })

    const saved = await utils.readJson<VersionDescriptor>(path_.join(root, 'versions', 'patched', 'patched.json'))
    assert.deepEqual(
      saved.processors?.map((p) => p.success),
      [true, undefined, undefined]
    )
  })

  it('fails when the processor jar has no main class', async () => {
    const descriptor = descriptorWith([{ jar: 'net.example:broken:1.0', classpath: [], args: [] }])

    await assert.rejects(new Patcher(config, javaPath).patch(descriptor), (err: unknown) => {
      assert.ok(err instanceof KilnError)
      assert.equal(err.code, 'NOT_FOUND')
      return true
    })
  })

  it('fails when Java cannot be started', async () => {
    const descriptor = descriptorWith([{ jar: 'net.example:proc:1.0', classpath: [], args: [] }])

    await assert.rejects(new Patcher(config, path_.join(root, 'missing-java')).patch(descriptor), (err: unknown) => {
      assert.ok(err instanceof KilnError)
      assert.equal(err.code, 'PROCESSOR_ERROR')
      return true
    })
  })
})
