/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import type { FullConfig } from '../../types/config'
import type { DownloaderEvents, LoaderEvents } from '../../types/events'
import type { VersionDescriptor } from '../../types/manifest'
import EventEmitter from '../utils/events'
import HttpClient from '../utils/http'
import ForgeLikeLoader from './loaders/forgelike'
import FabricLikeLoader from './loaders/fabriclike'

export default class LoaderManager extends EventEmitter<LoaderEvents & DownloaderEvents> {
  private readonly config: FullConfig
  private readonly client: HttpClient

  /**
   * @param config The installer configuration. `config.loader` selects the loader.
   * @param client The HTTP client used to fetch the loader metadata.
   */
  constructor(config: FullConfig, client: HttpClient) {
    super()
    this.config = config
    this.client = client
  }

  /**
   * Merge the loader into a version descriptor. The vanilla descriptor is returned unchanged.
   * @param descriptor The vanilla version descriptor. It is modified in place.
   * @returns The merged descriptor.
   */
  async merge(descriptor: VersionDescriptor) {
    const loader = this.config.loader

    switch (loader.type) {
      case 'FABRIC':
      case 'QUILT': {
        const fabricLikeLoader = new FabricLikeLoader(this.config, this.client, loader)
        fabricLikeLoader.forwardEvents(this)
        return await fabricLikeLoader.merge(descriptor)
      }
      case 'FORGE':
      case 'NEOFORGE': {
        const forgeLikeLoader = new ForgeLikeLoader(this.config, this.client, loader)
        forgeLikeLoader.forwardEvents(this)
        return await forgeLikeLoader.merge(descriptor)
      }
      default:
        return descriptor
    }
  }
}
