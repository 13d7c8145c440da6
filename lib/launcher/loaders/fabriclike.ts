/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import type { FullConfig } from '../../../types/config'
import type { Library, VersionDescriptor } from '../../../types/manifest'
import type { FabricLikeGameVersion, FabricLikeLoaderVersion, LoaderLibrary, LoaderProfile } from '../../../types/loader'
import path_ from 'node:path'
import utils from '../../utils/utils'
import EventEmitter from '../../utils/events'
import HttpClient from '../../utils/http'
import type { LoaderEvents } from '../../../types/events'
import { KilnError, ErrorType } from '../../../types/errors'

export default class FabricLikeLoader extends EventEmitter<LoaderEvents> {
  private readonly config: FullConfig
  private readonly client: HttpClient
  private readonly loader: { type: 'FABRIC' | 'QUILT'; version: string }
  private readonly metaConfig: { name: string; url: string; maven: string }

  /**
   * @param config The installer configuration.
   * @param client The HTTP client used to fetch the loader metadata.
   * @param loader The Fabric or Quilt loader to install.
   */
  constructor(config: FullConfig, client: HttpClient, loader: { type: 'FABRIC' | 'QUILT'; version: string }) {
    super()
    this.config = config
    this.client = client
    this.loader = loader

    if (this.loader.type === 'QUILT') {
      this.metaConfig = { name: 'Quilt', url: config.endpoints.quiltMeta, maven: config.endpoints.quiltMaven }
    } else {
      this.metaConfig = { name: 'Fabric', url: config.endpoints.fabricMeta, maven: config.endpoints.fabricMaven }
    }
  }

  /**
   * Merge the Fabric or Quilt profile into a version descriptor.
   * @param descriptor The vanilla version descriptor. It is modified in place.
   * @returns The merged descriptor.
   */
  async merge(descriptor: VersionDescriptor) {
    const name = this.metaConfig.name

    const [loaderVersions, gameVersions] = await Promise.all([
      this.client.getJson<FabricLikeLoaderVersion[]>(utils.joinUrl(this.metaConfig.url, 'versions/loader'), `${name} loader versions`),
      this.client.getJson<FabricLikeGameVersion[]>(utils.joinUrl(this.metaConfig.url, 'versions/game'), `${name} game versions`)
    ])

    if (!loaderVersions.some((v) => v.version === this.loader.version)) {
      throw new KilnError(ErrorType.UNKNOWN_VERSION, `${name} loader ${this.loader.version} does not exist`)
    }
    if (!gameVersions.some((v) => v.version === descriptor.id)) {
      throw new KilnError(ErrorType.UNKNOWN_VERSION, `${name} does not support Minecraft ${descriptor.id}`)
    }

    const profileUrl = utils.joinUrl(this.metaConfig.url, `versions/loader/${descriptor.id}/${this.loader.version}/profile/json`)
    const profile = await this.client.getJson<LoaderProfile>(profileUrl, `${name} profile`)

    const versionName = this.config.versionName
    await utils.writeJson(path_.join(this.config.root, 'versions', versionName, `${versionName}-profile.json`), profile)
    this.emit('loader_debug', `${name} ${this.loader.version} profile fetched (${profile.libraries.length} libraries)`)

    const keys = new Set(profile.libraries.map((lib) => utils.getLibraryKey(lib.name)))
    descriptor.libraries = descriptor.libraries.filter((lib) => !keys.has(utils.getLibraryKey(lib.name)))
    descriptor.libraries.push(...profile.libraries.map((lib) => this.formatLibrary(lib)))

    descriptor.arguments = descriptor.arguments ?? { game: [], jvm: [] }
    descriptor.arguments.jvm.push(...(profile.arguments?.jvm ?? []))
    descriptor.arguments.game.push(...(profile.arguments?.game ?? []))

    descriptor.mainClass = profile.mainClass

    return descriptor
  }

  private formatLibrary(lib: LoaderLibrary): Library {
    const path = utils.getLibraryPath(lib.name)

    return {
      name: lib.name,
      downloads: {
        artifact: {
          path: path,
          url: utils.joinUrl(lib.url ?? this.metaConfig.maven, path),
          sha1: lib.sha1 ?? '',
          size: lib.size ?? 0
        }
      }
    }
  }
}
