/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import crypto from 'node:crypto'
import fs from 'node:fs/promises'
import { createReadStream, existsSync } from 'node:fs'
import path_ from 'node:path'
import { KilnError, ErrorType } from '../../types/errors'
import type { OSName, Rule } from '../../types/manifest'

/**
 * Get the SHA1 hash of a file.
 * @param path Path of the file.
 * @returns The hex-encoded hash.
 */
function getFileHash(path: string) {
  return new Promise<string>((resolve, reject) => {
    const hash = crypto.createHash('sha1')
    const stream = createReadStream(path)
    stream.on('data', (chunk) => hash.update(chunk))
    stream.on('error', reject)
    stream.on('end', () => resolve(hash.digest('hex')))
  })
}

/**
 * Check a file against its expected hash.
 * @param path Path of the file.
 * @param sha1 Expected SHA1 hash. If empty, the file only has to exist.
 * @returns `true` if the file exists and matches `sha1`.
 */
async function isFileValid(path: string, sha1?: string) {
  if (!existsSync(path)) return false
  if (!sha1) return true
  try {
    return (await getFileHash(path)) === sha1.toLowerCase()
  } catch {
    return false
  }
}

function parseCoordinate(coordinate: string) {
  const parts = coordinate.split(':')
  if (parts.length < 3) {
    throw new KilnError(ErrorType.PARSE_ERROR, `Invalid artifact coordinate: '${coordinate}'`)
  }

  const [group, artifact] = parts
  const [version, versionExt] = parts[2].split('@')
  let classifier: string | null = null
  let ext = versionExt ?? 'jar'

  if (parts.length > 3) {
    const [cls, clsExt] = parts[3].split('@')
    classifier = cls
    ext = clsExt ?? 'jar'
  }

  return { group, artifact, version, classifier, ext }
}

/**
 * Get the relative path of a library from its Maven coordinate.
 * @param coordinate `group:artifact:version[:classifier][@ext]`.
 * @returns The path, with forward slashes (e.g. `'com/example/lib/1.0/lib-1.0.jar'`).
 */
function getLibraryPath(coordinate: string) {
  const { group, artifact, version } = parseCoordinate(coordinate)
  return `${group.split('.').join('/')}/${artifact}/${version}/${getLibraryName(coordinate)}`
}

/**
 * Get the file name of a library from its Maven coordinate.
 * @param coordinate `group:artifact:version[:classifier][@ext]`.
 * @returns The file name (e.g. `'lib-1.0-natives.jar'`).
 */
function getLibraryName(coordinate: string) {
  const { artifact, version, classifier, ext } = parseCoordinate(coordinate)
  return `${artifact}-${version}${classifier ? `-${classifier}` : ''}.${ext}`
}

/**
 * Get the identity of a library, ignoring its version.
 * @param name The library name (`group:artifact:version[...]`).
 * @returns `group:artifact`.
 */
function getLibraryKey(name: string) {
  return name.split(':').slice(0, 2).join(':')
}

/**
 * Get the current OS, as written in Minecraft manifests.
 */
function getOS_MCCode(): OSName {
  switch (process.platform) {
    case 'win32':
      return 'windows'
    case 'darwin':
      return 'osx'
    default:
      return 'linux'
  }
}

/**
 * Get the current architecture, as written in library rules.
 */
function getArch() {
  switch (process.arch) {
    case 'ia32':
      return 'x86'
    case 'x64':
      return 'x86_64'
    default:
      return process.arch
  }
}

/**
 * Get the current architecture bitness, used in native classifiers (`natives-windows-${arch}`).
 */
function getArchBits() {
  return process.arch === 'ia32' || process.arch === 'arm' ? '32' : '64'
}

/**
 * Check if a library should be installed on this computer.
 *
 * A rule applies when the OS and architecture it names (if any) are the current ones. The first
 * applying rule with an OS condition decides; rules without OS condition only allow.
 * @param rules The rules of the library.
 * @param os [Optional: default is the current OS]
 * @param arch [Optional: default is the current architecture]
 */
function isLibAllowed(rules: Rule[] | undefined, os: OSName = getOS_MCCode(), arch: string = getArch()) {
  if (!rules || rules.length === 0) return true

  let allowed = false

  for (const rule of rules) {
    if (!rule.os) {
      if (rule.action === 'allow') allowed = true
      continue
    }
    if (rule.os.name && rule.os.name !== os) continue
    if (rule.os.arch && rule.os.arch !== arch) continue
    return rule.action === 'allow'
  }

  return allowed
}

/**
 * Join a base URL and a relative path with exactly one slash.
 * @param base The base URL (e.g. a Maven repository).
 * @param path The relative path.
 */
function joinUrl(base: string, path: string) {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`
}

/**
 * Read and parse a JSON file.
 */
async function readJson<T>(path: string): Promise<T> {
  const content = await fs.readFile(path, 'utf-8')
  try {
    return JSON.parse(content)
  } catch (err) {
    throw new KilnError(ErrorType.PARSE_ERROR, `Invalid JSON in ${path}: ${err instanceof Error ? err.message : err}`)
  }
}

/**
 * Write a JSON file, creating its parent folders.
 */
async function writeJson(path: string, data: unknown) {
  await fs.mkdir(path_.dirname(path), { recursive: true })
  await fs.writeFile(path, JSON.stringify(data, null, 2))
}

export default {
  getFileHash,
  isFileValid,
  getLibraryPath,
  getLibraryName,
  getLibraryKey,
  getOS_MCCode,
  getArch,
  getArchBits,
  isLibAllowed,
  joinUrl,
  readJson,
  writeJson
}
