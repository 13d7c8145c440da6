/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import type { FullConfig } from '../../../types/config'
import type { Artifact, DataVariable, Library, VersionDescriptor } from '../../../types/manifest'
import type { InstallProfile, LegacyInstallProfile, LoaderLibrary, LoaderProfile } from '../../../types/loader'
import { existsSync } from 'node:fs'
import path_ from 'node:path'
import utils from '../../utils/utils'
import extractor from '../../utils/extractor'
import EventEmitter from '../../utils/events'
import HttpClient from '../../utils/http'
import Downloader from '../../utils/downloader'
import type { DownloaderEvents, LoaderEvents } from '../../../types/events'
import { KilnError, ErrorType } from '../../../types/errors'

/**
 * Group of the coordinates given to files extracted from installers.
 */
const EXTRACTS_GROUP = 'dev.kiln'

/**
 * Maven repository of the libraries listed without URL by old Forge installers.
 */
const LEGACY_LIBRARIES_URL = 'https://libraries.minecraft.net/'

function isLegacyProfile(profile: InstallProfile | LegacyInstallProfile): profile is LegacyInstallProfile {
  return 'install' in profile && 'versionInfo' in profile
}

export default class ForgeLikeLoader extends EventEmitter<LoaderEvents & DownloaderEvents> {
  private readonly config: FullConfig
  private readonly client: HttpClient
  private readonly loader: { type: 'FORGE' | 'NEOFORGE'; version: string }
  private readonly loaderId: string
  private readonly profileDir: string
  private readonly installerPath: string

  /**
   * @param config The installer configuration.
   * @param client The HTTP client used to download the loader installer.
   * @param loader The Forge or NeoForge loader to install.
   */
  constructor(config: FullConfig, client: HttpClient, loader: { type: 'FORGE' | 'NEOFORGE'; version: string }) {
    super()
    this.config = config
    this.client = client
    this.loader = loader
    this.loaderId = loader.type.toLowerCase()
    this.profileDir = path_.join(config.root, `.${this.loaderId}`, 'profiles', config.versionName)
    this.installerPath = path_.join(this.profileDir, `${this.loaderId}-${config.versionName}-installer.jar`)
  }

  /**
   * Get the URL of the loader installer.
   * @param gameVersion The Minecraft version.
   */
  getInstallerUrl(gameVersion: string) {
    if (this.loader.type === 'NEOFORGE') {
      const v = this.loader.version
      return utils.joinUrl(this.config.endpoints.neoforgeMaven, `net/neoforged/neoforge/${v}/neoforge-${v}-installer.jar`)
    }

    const v = this.loader.version.startsWith(`${gameVersion}-`) ? this.loader.version : `${gameVersion}-${this.loader.version}`
    return utils.joinUrl(this.config.endpoints.forgeMaven, `net/minecraftforge/forge/${v}/forge-${v}-installer.jar`)
  }

  /**
   * Merge the Forge or NeoForge installer into a version descriptor. The installer profile and
   * the loader version JSON are cached in `.<loader>/profiles/<versionName>/`.
   * @param descriptor The vanilla version descriptor. It is modified in place.
   * @returns The merged descriptor, with the installer data and processors attached.
   */
  async merge(descriptor: VersionDescriptor) {
    const name = this.config.versionName
    const installProfilePath = path_.join(this.profileDir, `installer-${name}.json`)
    const versionPath = path_.join(this.profileDir, `version-${name}.json`)

    if (!existsSync(installProfilePath) || !existsSync(versionPath)) {
      await this.extractProfiles(descriptor.id, installProfilePath, versionPath)
    }

    const installProfile = await utils.readJson<InstallProfile>(installProfilePath)
    const version = await utils.readJson<LoaderProfile>(versionPath)

    //* Data and processors
    const data = await this.processData(descriptor.id, installProfile.data ?? {})
    descriptor.data = {
      SIDE: { client: 'client', server: 'server' },
      MINECRAFT_VERSION: { client: descriptor.id, server: descriptor.id },
      ROOT: { client: this.config.root, server: '' },
      LIBRARY_DIR: { client: path_.join(this.config.root, 'libraries'), server: '' },
      MINECRAFT_JAR: { client: path_.join(this.config.root, 'versions', name, `${name}.jar`), server: '' },
      ...data
    }
    if (installProfile.processors && installProfile.processors.length > 0) {
      descriptor.processors = installProfile.processors
    }

    await this.extractMaven()

    //* Libraries
    const versionKeys = new Set(version.libraries.map((lib) => utils.getLibraryKey(lib.name)))
    descriptor.libraries = descriptor.libraries.filter((lib) => !versionKeys.has(utils.getLibraryKey(lib.name)))

    const seen = new Set<string>()
    descriptor.libraries.push(...this.mergeLibraries(version.libraries, seen, false))
    descriptor.libraries.push(...this.mergeLibraries(installProfile.libraries, seen, true))

    //* Arguments and main class
    if (version.arguments) {
      descriptor.arguments = descriptor.arguments ?? { game: [], jvm: [] }
      descriptor.arguments.jvm.push(...(version.arguments.jvm ?? []))
      descriptor.arguments.game.push(...(version.arguments.game ?? []))
    }
    if (version.minecraftArguments) descriptor.minecraftArguments = version.minecraftArguments

    descriptor.mainClass = version.mainClass

    return descriptor
  }

  /**
   * Download the installer, unless it is already cached.
   */
  private async ensureInstaller(gameVersion: string) {
    if (existsSync(this.installerPath)) return

    const url = this.getInstallerUrl(gameVersion)
    this.emit('loader_debug', `Downloading ${this.loader.type} installer from ${url}`)

    const downloader = new Downloader(this.client, this.config.download)
    downloader.forwardEvents(this)
    await downloader.downloadMany([
      { name: path_.basename(this.installerPath), path: this.installerPath, url: url, type: 'CUSTOM' }
    ])
  }

  /**
   * Extract `install_profile.json` and the loader version JSON from the installer.
   */
  private async extractProfiles(gameVersion: string, installProfilePath: string, versionPath: string) {
    await this.ensureInstaller(gameVersion)

    const text = extractor.readFile(this.installerPath, 'install_profile.json')
    let profile: InstallProfile | LegacyInstallProfile
    try {
      profile = JSON.parse(text)
    } catch (err: unknown) {
      throw new KilnError(ErrorType.PARSE_ERROR, `Invalid install_profile.json: ${err instanceof Error ? err.message : err}`)
    }

    if (isLegacyProfile(profile)) {
      await this.extractLegacyProfile(profile, installProfilePath, versionPath)
      return
    }

    await extractor.extractFile(this.installerPath, 'install_profile.json', installProfilePath)
    const versionEntry = (profile.json ?? 'version.json').replace(/^\/+/, '')
    await extractor.extractFile(this.installerPath, versionEntry, versionPath)
  }

  /**
   * Old installers (1.12.2 and older) bundle the version JSON in the install profile, and the
   * loader itself as a universal jar.
   */
  private async extractLegacyProfile(profile: LegacyInstallProfile, installProfilePath: string, versionPath: string) {
    const universal = profile.install.path
    const universalPath = utils.getLibraryPath(universal)

    await extractor.extractFile(this.installerPath, profile.install.filePath, path_.join(this.config.root, 'libraries', universalPath))

    const version: LoaderProfile = {
      ...profile.versionInfo,
      libraries: profile.versionInfo.libraries.map((lib) => {
        if (lib.name === universal) {
          return { name: lib.name, downloads: { artifact: { path: universalPath, url: '', sha1: '', size: 0 } } }
        }
        return { ...lib, url: lib.url ?? LEGACY_LIBRARIES_URL }
      })
    }
    const installProfile: InstallProfile = {
      version: profile.install.version,
      path: universal,
      minecraft: profile.install.minecraft,
      libraries: []
    }

    await utils.writeJson(versionPath, version)
    await utils.writeJson(installProfilePath, installProfile)
  }

  /**
   * Extract the installer files referenced by data variables (values starting with `/`) into
   * the libraries folder, and replace them with their coordinate.
   */
  private async processData(gameVersion: string, data: Record<string, DataVariable>) {
    const processed: Record<string, DataVariable> = {}

    for (const [key, value] of Object.entries(data)) {
      if (!value.client.startsWith('/')) {
        processed[key] = value
        continue
      }

      const entry = value.client.substring(1)
      const file = path_.posix.basename(entry)
      const dot = file.indexOf('.')
      const classifier = dot === -1 ? file : `${file.substring(0, dot)}@${file.substring(file.lastIndexOf('.') + 1)}`
      const coordinate = `${EXTRACTS_GROUP}:${this.loaderId}-installer-extracts:${gameVersion}:${classifier}`

      await this.ensureInstaller(gameVersion)
      await extractor.extractFile(this.installerPath, entry, path_.join(this.config.root, 'libraries', utils.getLibraryPath(coordinate)))

      processed[key] = { ...value, client: `[${coordinate}]` }
    }

    return processed
  }

  /**
   * Extract the libraries bundled in the installer (`maven/` folder). Failures are reported and ignored.
   */
  private async extractMaven() {
    if (!existsSync(this.installerPath)) return

    try {
      const amount = await extractor.extractDirectory(this.installerPath, 'maven/', path_.join(this.config.root, 'libraries'))
      this.emit('loader_debug', `Extracted ${amount} bundled libraries`)
    } catch (err: unknown) {
      this.emit('loader_extract_error', { filename: 'maven/', message: err instanceof Error ? err.message : `${err}` })
    }
  }

  /**
   * Format loader libraries. A library whose full coordinate was already merged is skipped, so
   * classifiers (`universal`, `client`) and other versions needed by the processors are kept.
   * @param skipArgs Whether the libraries are only needed by the processors.
   */
  private mergeLibraries(libs: LoaderLibrary[], seen: Set<string>, skipArgs: boolean) {
    const libraries: Library[] = []

    for (const lib of libs) {
      if (seen.has(lib.name)) continue

      let artifact: Artifact
      if (lib.url) {
        const path = utils.getLibraryPath(lib.name)
        artifact = { path: path, url: utils.joinUrl(lib.url, path), sha1: lib.sha1 ?? '', size: lib.size ?? 0 }
      } else if (lib.downloads?.artifact?.path) {
        const { path, url, sha1, size } = lib.downloads.artifact
        artifact = { path: path, url: url, sha1: sha1, size: size }
      } else {
        this.emit('loader_debug', `Skipping library ${lib.name}: no download information`)
        continue
      }

      seen.add(lib.name)
      const library: Library = { name: lib.name, downloads: { artifact: artifact } }
      if (skipArgs) library.skipArgs = true
      libraries.push(library)
    }

    return libraries
  }
}
