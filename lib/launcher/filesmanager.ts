/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 * @copyright Copyright (c) 2019, Pierce Harriz, from [Minecraft Launcher Core](https://github.com/Pierce01/MinecraftLauncher-core)
 */

import type { FullConfig } from '../../types/config'
import type { File, NativeFile } from '../../types/file'
import type { AssetIndex, VersionDescriptor } from '../../types/manifest'
import utils from '../utils/utils'
import extractor from '../utils/extractor'
import path_ from 'node:path'
import fs from 'node:fs/promises'
import { existsSync } from 'node:fs'
import EventEmitter from '../utils/events'
import type { FilesManagerEvents } from '../../types/events'

/**
 * Maximum number of files hashed at the same time.
 */
const CHECK_CONCURRENCY = 64

export default class FilesManager extends EventEmitter<FilesManagerEvents> {
  private readonly config: FullConfig
  private readonly descriptor: VersionDescriptor

  /**
   * @param config The installer configuration.
   * @param descriptor The resolved version descriptor.
   */
  constructor(config: FullConfig, descriptor: VersionDescriptor) {
    super()
    this.config = config
    this.descriptor = descriptor
  }

  /**
   * Folder where the native libraries are extracted (`natives/<version>`).
   */
  get nativesFolder() {
    return path_.join(this.config.root, 'natives', this.config.version)
  }

  /**
   * Get the client jar (`versions/<versionName>/<versionName>.jar`).
   */
  getClient(): File {
    const name = this.config.versionName
    const client = this.descriptor.downloads.client

    return {
      name: `${name}.jar`,
      path: path_.join(this.config.root, 'versions', name, `${name}.jar`),
      url: client.url,
      sha1: client.sha1,
      size: client.size,
      type: 'LIBRARY'
    }
  }

  /**
   * Get the libraries allowed on this computer.
   * @param withNatives Whether to include the native classifiers of old versions. They are
   * only needed when the natives folder must be filled.
   * @returns `libraries`: every library file (including `natives`); `natives`: native
   * classifiers to extract once downloaded.
   */
  getLibraries(withNatives: boolean) {
    const libraries: File[] = []
    const natives: NativeFile[] = []
    const os = utils.getOS_MCCode()

    this.descriptor.libraries.forEach((lib) => {
      if (!utils.isLibAllowed(lib.rules)) return

      const artifact = lib.downloads?.artifact
      if (artifact) {
        const path = artifact.path ?? utils.getLibraryPath(lib.name)
        libraries.push({
          name: path_.posix.basename(path),
          path: path_.join(this.config.root, 'libraries', path),
          url: artifact.url,
          sha1: artifact.sha1,
          size: artifact.size,
          type: 'LIBRARY'
        })
      }

      if (!withNatives || !lib.natives) return

      const classifier = lib.natives[os]?.replace('${arch}', utils.getArchBits())
      const native = classifier ? lib.downloads?.classifiers?.[classifier] : undefined
      if (!classifier || !native) return

      const path = native.path ?? utils.getLibraryPath(`${lib.name}:${classifier}`)
      const file: NativeFile = {
        name: path_.posix.basename(path),
        path: path_.join(this.config.root, 'libraries', path),
        url: native.url,
        sha1: native.sha1,
        size: native.size,
        type: 'LIBRARY',
        exclude: lib.extract?.exclude ?? []
      }
      libraries.push(file)
      natives.push(file)
    })

    return { libraries, natives }
  }

  /**
   * Get the assets of an asset index (`assets/objects/<hash[0..2]>/<hash>`).
   */
  getAssets(index: AssetIndex): File[] {
    return Object.entries(index.objects).map(([name, { hash, size }]) => ({
      name: name,
      path: path_.join(this.config.root, 'assets', 'objects', hash.substring(0, 2), hash),
      url: utils.joinUrl(this.config.endpoints.resources, `${hash.substring(0, 2)}/${hash}`),
      sha1: hash,
      size: size,
      type: 'ASSET'
    }))
  }

  /**
   * Find the missing and corrupt files. Files without URL are ignored.
   * @param files The expected files.
   * @returns The files to download.
   */
  async check(files: File[]) {
    const queue = files.filter((file) => file.url !== '')
    const checked = queue.length
    const broken: File[] = []

    const workers = Array(Math.min(CHECK_CONCURRENCY, queue.length))
      .fill(null)
      .map(async () => {
        for (let file = queue.shift(); file; file = queue.shift()) {
          if (!(await utils.isFileValid(file.path, file.sha1))) broken.push(file)
        }
      })

    await Promise.all(workers)

    this.emit('check_end', { checked: checked, broken: broken.length })

    return broken
  }

  /**
   * Copy the assets of old versions to the folder they are read from: `assets/virtual/legacy`
   * for virtual indexes, `resources` for indexes mapped to resources. A failed copy is reported
   * and skipped.
   * @returns The number of copied files.
   */
  async copyAssets(index: AssetIndex) {
    let dest: string
    if (index.virtual) dest = path_.join(this.config.root, 'assets', 'virtual', 'legacy')
    else if (index.map_to_resources) dest = path_.join(this.config.root, 'resources')
    else return 0

    let amount = 0

    for (const [name, { hash }] of Object.entries(index.objects)) {
      const source = path_.join(this.config.root, 'assets', 'objects', hash.substring(0, 2), hash)
      const target = path_.join(dest, name)

      try {
        if (await utils.isFileValid(target, hash)) continue
        await fs.mkdir(path_.dirname(target), { recursive: true })
        await fs.copyFile(source, target)
        amount++
        this.emit('copy_progress', { filename: name, dest: target })
      } catch (err: unknown) {
        this.emit('copy_error', { filename: name, message: err instanceof Error ? err.message : `${err}` })
      }
    }

    this.emit('copy_end', { amount: amount })

    return amount
  }

  /**
   * Extract native classifiers into the natives folder. `META-INF/` and the excluded entries of
   * each library are skipped.
   * @returns The number of extracted files.
   */
  async extractNatives(natives: NativeFile[]) {
    let amount = 0

    for (const native of natives) {
      if (!existsSync(native.path)) continue
      amount += await extractor.extractAll(native.path, this.nativesFolder, ['META-INF/', ...native.exclude])
      this.emit('extract_progress', { filename: native.name })
    }

    this.emit('extract_end', { amount: amount })

    return amount
  }
}
