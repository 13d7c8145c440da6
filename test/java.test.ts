/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import { describe, it, before, after } from 'node:test'
import assert from 'node:assert/strict'
import path_ from 'node:path'
import Java from '../lib/java/java'
import HttpClient from '../lib/utils/http'
import { DEFAULT_DOWNLOAD_OPTIONS } from '../lib/utils/downloader'
import { DEFAULT_ENDPOINTS } from '../lib/launcher/installer'
import { KilnError } from '../types/errors'
import type { FullConfig } from '../types/config'
import TestServer from './helpers/server'

function makeConfig(server: TestServer, absolutePath: string | null = null): FullConfig {
  return {
    root: '/games/kiln',
    version: '1.21.4',
    versionName: '1.21.4',
    loader: { type: 'VANILLA' },
    java: { absolutePath: absolutePath, runtimeDir: '/games/kiln/runtimes' },
    download: DEFAULT_DOWNLOAD_OPTIONS,
    endpoints: { ...DEFAULT_ENDPOINTS, javaManifest: `${server.url}/java/all.json` },
    client: null
  }
}

describe('Java.getManifestKey', () => {
  it('maps Linux', () => {
    assert.equal(Java.getManifestKey('linux', 'x64', 21), 'linux')
    assert.equal(Java.getManifestKey('linux', 'arm64', 21), 'linux')
    assert.equal(Java.getManifestKey('linux', 'ia32', 8), 'linux-i386')
  })

  it('maps Windows', () => {
    assert.equal(Java.getManifestKey('win32', 'x64', 21), 'windows-x64')
    assert.equal(Java.getManifestKey('win32', 'ia32', 8), 'windows-x86')
    assert.equal(Java.getManifestKey('win32', 'arm64', 21), 'windows-arm64')
  })

  it('maps macOS, falling back to x64 for Java 8 on arm64', () => {
    assert.equal(Java.getManifestKey('darwin', 'x64', 21), 'mac-os')
    assert.equal(Java.getManifestKey('darwin', 'arm64', 21), 'mac-os-arm64')
    assert.equal(Java.getManifestKey('darwin', 'arm64', 8), 'mac-os')
  })

  it('rejects other architectures', () => {
    assert.throws(
      () => Java.getManifestKey('linux', 'ppc64', 21),
      (err: unknown) => err instanceof KilnError && err.code === 'UNSUPPORTED_ARCHITECTURE'
    )
  })
})

describe('Java', () => {
  let server: TestServer
  let client: HttpClient

  before(async () => {
    server = await new TestServer().start()
    client = new HttpClient()

    server.json('/java/all.json', {
      [Java.getManifestKey(process.platform, process.arch, 21)]: {
        'java-runtime-delta': [{ manifest: { sha1: 'abc', size: 10, url: `${server.url}/java/delta.json` } }]
      }
    })
    server.json('/java/delta.json', {
      files: {
        bin: { type: 'directory' },
        'bin/java': { type: 'file', executable: true, downloads: { raw: { sha1: 'aaa', size: 3, url: `${server.url}/java/bin/java` } } },
        'lib/modules': { type: 'file', executable: false, downloads: { raw: { sha1: 'bbb', size: 4, url: `${server.url}/java/lib/modules` } } },
        'legal/LICENSE': { type: 'link', target: '../LICENSE' }
      }
    })
  })

  after(async () => {
    client.destroy()
    await server.close()
  })

  it('lists the runtime files under the component folder', async () => {
    const java = new Java(makeConfig(server), client, { component: 'java-runtime-delta', majorVersion: 21 })
    const files = await java.getFiles()

    assert.deepEqual(files, [
      {
        name: 'bin/java',
        path: path_.join('/games/kiln/runtimes', 'java-runtime-delta', 'bin/java'),
        url: `${server.url}/java/bin/java`,
        sha1: 'aaa',
        size: 3,
        type: 'JAVA',
        executable: true
      },
      {
        name: 'lib/modules',
        path: path_.join('/games/kiln/runtimes', 'java-runtime-delta', 'lib/modules'),
        url: `${server.url}/java/lib/modules`,
        sha1: 'bbb',
        size: 4,
        type: 'JAVA',
        executable: false
      }
    ])
  })

  it('fails when the component is not available', async () => {
    const java = new Java(makeConfig(server), client, { component: 'java-runtime-gamma', majorVersion: 17 })

    await assert.rejects(java.getManifestUrl(), (err: unknown) => err instanceof KilnError && err.code === 'NOT_FOUND')
  })

  it('prefers the configured Java executable', () => {
    const java = new Java(makeConfig(server, '/usr/bin/java'), client)
    assert.equal(java.getJavaPath(), '/usr/bin/java')
  })
})
