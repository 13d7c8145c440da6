/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import AdmZip from 'adm-zip'
import fs from 'node:fs/promises'
import path_ from 'node:path'
import { KilnError, ErrorType } from '../../types/errors'

function open(archive: string) {
  try {
    return new AdmZip(archive)
  } catch (err: unknown) {
    throw new KilnError(ErrorType.FILE_ERROR, `Cannot open archive ${archive}: ${err instanceof Error ? err.message : err}`)
  }
}

function normalize(entryName: string) {
  return entryName.replace(/\\/g, '/').replace(/^\/+/, '')
}

/**
 * Resolve an entry path inside `dir`, or `null` if it would be written outside of it.
 */
function safeJoin(dir: string, relative: string) {
  const target = path_.resolve(dir, relative)
  const rel = path_.relative(path_.resolve(dir), target)
  if (!rel || rel.startsWith('..') || path_.isAbsolute(rel)) return null
  return target
}

/**
 * Extract every entry of an archive.
 * @param archive Path of the ZIP archive.
 * @param dir Output folder.
 * @param exclude [Optional] Entry name prefixes to skip (e.g. `['META-INF/']`).
 * @returns The number of files written.
 */
async function extractAll(archive: string, dir: string, exclude: string[] = []) {
  const zip = open(archive)
  let amount = 0

  await fs.mkdir(dir, { recursive: true })

  for (const entry of zip.getEntries()) {
    const name = normalize(entry.entryName)
    if (exclude.some((prefix) => name.startsWith(prefix))) continue

    const target = safeJoin(dir, name)
    if (!target) continue

    if (entry.isDirectory) {
      await fs.mkdir(target, { recursive: true })
    } else {
      await fs.mkdir(path_.dirname(target), { recursive: true })
      await fs.writeFile(target, entry.getData())
      amount++
    }
  }

  return amount
}

/**
 * Extract a single entry of an archive.
 * @param archive Path of the ZIP archive.
 * @param entryName Full name of the entry (e.g. `'install_profile.json'`).
 * @param output Output file path. Parent folders are created.
 */
async function extractFile(archive: string, entryName: string, output: string) {
  const entry = open(archive).getEntry(entryName)
  if (!entry || entry.isDirectory) {
    throw new KilnError(ErrorType.NOT_FOUND, `File '${entryName}' not found in ${path_.basename(archive)}`)
  }

  await fs.mkdir(path_.dirname(output), { recursive: true })
  await fs.writeFile(output, entry.getData())
}

/**
 * Extract every entry under a folder of an archive, keeping the structure relative to that folder.
 * @param archive Path of the ZIP archive.
 * @param prefix Folder in the archive (e.g. `'maven/'`).
 * @param dir Output folder.
 * @returns The number of files written.
 */
async function extractDirectory(archive: string, prefix: string, dir: string) {
  const zip = open(archive)
  const folder = normalize(prefix).replace(/\/+$/, '')
  let found = false
  let amount = 0

  for (const entry of zip.getEntries()) {
    const name = normalize(entry.entryName)
    if (name !== folder && !name.startsWith(`${folder}/`)) continue
    found = true

    const relative = name.substring(folder.length + 1)
    if (!relative) continue

    const target = safeJoin(dir, relative)
    if (!target) continue

    if (entry.isDirectory) {
      await fs.mkdir(target, { recursive: true })
    } else {
      await fs.mkdir(path_.dirname(target), { recursive: true })
      await fs.writeFile(target, entry.getData())
      amount++
    }
  }

  if (!found) {
    throw new KilnError(ErrorType.NOT_FOUND, `Folder '${prefix}' not found in ${path_.basename(archive)}`)
  }

  return amount
}

/**
 * Read an entry of an archive as text.
 * @param archive Path of the ZIP archive.
 * @param entryName Full name of the entry (e.g. `'META-INF/MANIFEST.MF'`).
 */
function readFile(archive: string, entryName: string) {
  const entry = open(archive).getEntry(entryName)
  if (!entry || entry.isDirectory) {
    throw new KilnError(ErrorType.NOT_FOUND, `File '${entryName}' not found in ${path_.basename(archive)}`)
  }
  return entry.getData().toString('utf8')
}

export default { extractAll, extractFile, extractDirectory, readFile }
