/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import type { DownloaderEvents, FilesManagerEvents, InstallerEvents, LoaderEvents, PatcherEvents } from '../../types/events'
import type { Config, Endpoints, FullConfig } from '../../types/config'
import type { AssetIndex, VersionDescriptor, VersionManifest } from '../../types/manifest'
import type { File } from '../../types/file'
import type { Loader } from '../../types/loader'
import EventEmitter from '../utils/events'
import utils from '../utils/utils'
import path_ from 'node:path'
import fs from 'node:fs/promises'
import { existsSync } from 'node:fs'
import HttpClient from '../utils/http'
import Downloader, { DEFAULT_DOWNLOAD_OPTIONS } from '../utils/downloader'
import FilesManager from './filesmanager'
import LoaderManager from './loadermanager'
import Patcher from './loaders/patcher'
import Java from '../java/java'
import { KilnError, ErrorType } from '../../types/errors'

export const DEFAULT_ENDPOINTS: Endpoints = {
  versionManifest: 'https://piston-meta.mojang.com/mc/game/version_manifest_v2.json',
  resources: 'https://resources.download.minecraft.net/',
  javaManifest: 'https://launchermeta.mojang.com/v1/products/java-runtime/2ec0cc96c44e5a76b9c8b7c39df7210883d12871/all.json',
  fabricMeta: 'https://meta.fabricmc.net/v2/',
  fabricMaven: 'https://maven.fabricmc.net/',
  quiltMeta: 'https://meta.quiltmc.org/v3/',
  quiltMaven: 'https://maven.quiltmc.org/repository/release/',
  forgeMaven: 'https://maven.minecraftforge.net/',
  neoforgeMaven: 'https://maven.neoforged.net/releases/'
}

/**
 * Install a Minecraft version, with an optional mod loader, its assets and its Java runtime.
 *
 * Calling `install()` again repairs the installation: only missing and corrupt files are
 * downloaded again, and the processors that already succeeded are not run again.
 *
 * @example
 * ```typescript
 * const installer = new Installer({
 *   root: '/home/steve/.minecraft',
 *   version: '1.21.4',
 *   loader: { type: 'FABRIC', version: '0.16.9' }
 * })
 * installer.on('download_batch_progress', (p) => console.log(`${p.downloaded}/${p.total}`))
 * await installer.install()
 * ```
 */
export default class Installer extends EventEmitter<InstallerEvents & DownloaderEvents & FilesManagerEvents & LoaderEvents & PatcherEvents> {
  private readonly config: FullConfig

  /**
   * @param config The configuration of the Installer.
   */
  constructor(config: Config) {
    super()

    const loader: Loader = config.loader ?? { type: 'VANILLA' }
    const root = path_.resolve(config.root)

    this.config = {
      root: root,
      version: config.version,
      versionName: config.versionName ?? (loader.type === 'VANILLA' ? config.version : `${config.version}-${loader.version}`),
      loader: loader,
      java: {
        absolutePath: config.java?.absolutePath ?? null,
        runtimeDir: config.java?.runtimeDir ?? path_.join(root, 'runtimes')
      },
      download: { ...DEFAULT_DOWNLOAD_OPTIONS, ...config.download },
      endpoints: { ...DEFAULT_ENDPOINTS, ...config.endpoints },
      client: config.client ?? null
    }
  }

  /**
   * Install or repair the version.
   * @returns The resolved version descriptor, as saved in `versions/<versionName>/<versionName>.json`.
   */
  async install() {
    const client = this.config.client ?? new HttpClient()

    try {
      return await this.run(client)
    } finally {
      if (!this.config.client) client.destroy()
    }
  }

  private async run(client: HttpClient) {
    //* Resolve version
    const descriptor = await this.resolve(client)
    const index = await this.getAssetIndex(client, descriptor)

    //* Compute files
    const java = new Java(this.config, client, descriptor.javaVersion)
    const filesManager = new FilesManager(this.config, descriptor)
    filesManager.forwardEvents(this)

    await fs.mkdir(filesManager.nativesFolder, { recursive: true })
    const withNatives = (await fs.readdir(filesManager.nativesFolder)).length === 0

    const { libraries, natives } = filesManager.getLibraries(withNatives)
    const allFiles = [filesManager.getClient(), ...libraries, ...filesManager.getAssets(index), ...(await java.getFiles())]
    const files = new Map<string, File>()
    allFiles.forEach((file) => {
      if (!files.has(file.path)) files.set(file.path, file)
    })

    //* Check files
    this.emit('install_check', { amount: files.size })
    const filesToDownload = await filesManager.check([...files.values()])

    //* Download
    this.emit('install_download', {
      total: { amount: filesToDownload.length, size: filesToDownload.reduce((acc, file) => acc + (file.size ?? 0), 0) }
    })

    const downloader = new Downloader(client, this.config.download)
    downloader.forwardEvents(this)
    await downloader.downloadMany(filesToDownload)

    //* Legacy assets
    this.emit('install_copy_assets')
    await filesManager.copyAssets(index)

    //* Natives
    this.emit('install_extract_natives', { amount: natives.length })
    await filesManager.extractNatives(natives)

    //* Loader processors
    if (descriptor.processors && descriptor.processors.length > 0) {
      this.emit('install_patch_loader', { amount: descriptor.processors.length })
      const patcher = new Patcher(this.config, java.getJavaPath())
      patcher.forwardEvents(this)
      await patcher.patch(descriptor)
    }

    this.emit('install_end', { version: this.config.versionName })

    return descriptor
  }

  /**
   * Read the resolved version JSON, or build it from the version manifest and the loader.
   */
  private async resolve(client: HttpClient) {
    const name = this.config.versionName
    const jsonPath = path_.join(this.config.root, 'versions', name, `${name}.json`)

    this.emit('install_resolve', { version: name })

    if (existsSync(jsonPath)) {
      this.emit('install_debug', `Using the saved version JSON ${jsonPath}`)
      return await utils.readJson<VersionDescriptor>(jsonPath)
    }

    const manifest = await client.getJson<VersionManifest>(this.config.endpoints.versionManifest, 'version manifest')
    const version = manifest.versions.find((v) => v.id === this.config.version)
    if (!version) {
      throw new KilnError(ErrorType.UNKNOWN_VERSION, `Minecraft ${this.config.version} does not exist`)
    }

    const descriptor = await client.getJson<VersionDescriptor>(version.url, `Minecraft ${this.config.version} manifest`)

    const loader = this.config.loader
    this.emit('install_merge_loader', { type: loader.type, version: loader.type === 'VANILLA' ? null : loader.version })

    const loaderManager = new LoaderManager(this.config, client)
    loaderManager.forwardEvents(this)
    const merged = await loaderManager.merge(descriptor)

    await utils.writeJson(jsonPath, merged)

    return merged
  }

  /**
   * Read the asset index from `assets/indexes/`, or download it.
   */
  private async getAssetIndex(client: HttpClient, descriptor: VersionDescriptor) {
    const indexPath = path_.join(this.config.root, 'assets', 'indexes', `${descriptor.assetIndex.id}.json`)

    if (existsSync(indexPath)) {
      return await utils.readJson<AssetIndex>(indexPath)
    }

    const index = await client.getJson<AssetIndex>(descriptor.assetIndex.url, `asset index ${descriptor.assetIndex.id}`)
    await utils.writeJson(indexPath, index)

    return index
  }
}
