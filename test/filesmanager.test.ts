/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import { describe, it, before, after } from 'node:test'
import assert from 'node:assert/strict'
import fs from 'node:fs/promises'
import os from 'node:os'
import path_ from 'node:path'
import AdmZip from 'adm-zip'
import FilesManager from '../lib/launcher/filesmanager'
import utils from '../lib/utils/utils'
import type { File, NativeFile } from '../types/file'
import type { AssetIndex } from '../types/manifest'
import { sha1 } from './helpers/server'
import { makeConfig, makeDescriptor } from './helpers/fixtures'

const PRESENT = Buffer.from('present sound')
const MISSING = Buffer.from('missing icon')

describe('FilesManager', () => {
  let root: string

  const objectPath = (data: Buffer) => path_.join(root, 'assets', 'objects', sha1(data).substring(0, 2), sha1(data))
  const newManager = () => new FilesManager(makeConfig(root, 'http://127.0.0.1:1'), makeDescriptor())

  before(async () => {
    root = await fs.mkdtemp(path_.join(os.tmpdir(), 'kiln-files-'))
    await fs.mkdir(path_.dirname(objectPath(PRESENT)), { recursive: true })
    await fs.writeFile(objectPath(PRESENT), PRESENT)
  })

  after(async () => {
    await fs.rm(root, { recursive: true, force: true })
  })

  describe('copyAssets', () => {
    it('reports a missing object and copies the others', async () => {
      const index: AssetIndex = {
        virtual: true,
        objects: {
          'icons/missing.png': { hash: sha1(MISSING), size: MISSING.length },
          'sounds/present.ogg': { hash: sha1(PRESENT), size: PRESENT.length }
        }
      }
      const manager = newManager()
      const errors: string[] = []
      const copied: string[] = []
      const ends: number[] = []
      manager.on('copy_error', (e) => errors.push(e.filename))
      manager.on('copy_progress', (e) => copied.push(e.filename))
      manager.on('copy_end', (e) => ends.push(e.amount))

      assert.equal(await manager.copyAssets(index), 1)
      assert.deepEqual(errors, ['icons/missing.png'])
      assert.deepEqual(copied, ['sounds/present.ogg'])
      assert.deepEqual(ends, [1])
      assert.deepEqual(await fs.readFile(path_.join(root, 'assets', 'virtual', 'legacy', 'sounds', 'present.ogg')), PRESENT)
    })

    it('copies the assets mapped to resources', async () => {
      const index: AssetIndex = {
        map_to_resources: true,
        objects: { 'sound/present.ogg': { hash: sha1(PRESENT), size: PRESENT.length } }
      }

      assert.equal(await newManager().copyAssets(index), 1)
      assert.deepEqual(await fs.readFile(path_.join(root, 'resources', 'sound', 'present.ogg')), PRESENT)
      assert.equal(await newManager().copyAssets(index), 0)
    })

    it('copies nothing for modern indexes', async () => {
      const index: AssetIndex = { objects: { 'sounds/present.ogg': { hash: sha1(PRESENT), size: PRESENT.length } } }
      assert.equal(await newManager().copyAssets(index), 0)
    })
  })

  describe('check', () => {
    it('returns the missing and corrupt files and ignores files without URL', async () => {
      const corrupt = path_.join(root, 'check', 'corrupt.jar')
      await fs.mkdir(path_.dirname(corrupt), { recursive: true })
      await fs.writeFile(corrupt, 'corrupt')

      const files: File[] = [
        { name: 'present', path: objectPath(PRESENT), url: 'http://127.0.0.1:1/a', sha1: sha1(PRESENT), type: 'ASSET' },
        { name: 'corrupt.jar', path: corrupt, url: 'http://127.0.0.1:1/b', sha1: sha1('valid'), type: 'LIBRARY' },
        { name: 'missing.jar', path: path_.join(root, 'check', 'missing.jar'), url: 'http://127.0.0.1:1/c', type: 'LIBRARY' },
        { name: 'generated.jar', path: path_.join(root, 'check', 'generated.jar'), url: '', type: 'LIBRARY' }
      ]
      const manager = newManager()
      const ends: { checked: number; broken: number }[] = []
      manager.on('check_end', (e) => ends.push(e))

      const broken = await manager.check(files)

      assert.deepEqual(broken.map((file) => file.name).sort(), ['corrupt.jar', 'missing.jar'])
      assert.deepEqual(ends, [{ checked: 3, broken: 2 }])
    })
  })

  describe('extractNatives', () => {
    it('skips META-INF and the excluded entries', async () => {
      const zip = new AdmZip()
      zip.addFile('META-INF/MANIFEST.MF', Buffer.from('Manifest-Version: 1.0\n'))
      zip.addFile('liblwjgl.so', Buffer.from('native'))
      zip.addFile('debug/liblwjgl.dbg', Buffer.from('debug'))
      const jar = path_.join(root, 'libraries', utils.getLibraryPath('org.lwjgl:lwjgl:3.3.3:natives-linux'))
      await fs.mkdir(path_.dirname(jar), { recursive: true })
      await fs.writeFile(jar, zip.toBuffer())

      const native: NativeFile = { name: 'lwjgl-3.3.3-natives-linux.jar', path: jar, url: '', type: 'LIBRARY', exclude: ['debug/'] }
      const manager = newManager()

      assert.equal(await manager.extractNatives([native]), 1)
      assert.deepEqual(await fs.readdir(manager.nativesFolder), ['liblwjgl.so'])
    })
  })
})
