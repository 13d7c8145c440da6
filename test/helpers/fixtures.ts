/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import type { FullConfig } from '../../types/config'
import type { Loader } from '../../types/loader'
import type { VersionDescriptor } from '../../types/manifest'
import { DEFAULT_DOWNLOAD_OPTIONS } from '../../lib/utils/downloader'
import { DEFAULT_ENDPOINTS } from '../../lib/launcher/installer'

/**
 * Configuration with every endpoint pointing to the test server.
 */
export function makeConfig(root: string, serverUrl: string, loader: Loader = { type: 'VANILLA' }, versionName = '1.21.4'): FullConfig {
  return {
    root: root,
    version: '1.21.4',
    versionName: versionName,
    loader: loader,
    java: { absolutePath: null, runtimeDir: `${root}/runtimes` },
    download: { ...DEFAULT_DOWNLOAD_OPTIONS, retryDelay: 10, stallTimeout: 2000 },
    endpoints: {
      ...DEFAULT_ENDPOINTS,
      versionManifest: `${serverUrl}/mc/version_manifest.json`,
      resources: `${serverUrl}/resources/`,
      javaManifest: `${serverUrl}/java/all.json`,
      fabricMeta: `${serverUrl}/fabric/v2/`,
      fabricMaven: `${serverUrl}/fabric/maven/`,
      quiltMeta: `${serverUrl}/quilt/v3/`,
      quiltMaven: `${serverUrl}/quilt/maven/`,
      forgeMaven: `${serverUrl}/forge/maven/`,
      neoforgeMaven: `${serverUrl}/neoforge/maven/`
    },
    client: null
  }
}

/**
 * Minimal vanilla version descriptor.
 */
export function makeDescriptor(overrides: Partial<VersionDescriptor> = {}): VersionDescriptor {
  return {
    id: '1.21.4',
    type: 'release',
    mainClass: 'net.minecraft.client.main.Main',
    arguments: { game: ['--username', '${auth_player_name}'], jvm: ['-Djava.library.path=${natives_directory}'] },
    assetIndex: { id: '19', sha1: '', size: 0, url: '' },
    assets: '19',
    downloads: { client: { sha1: '', size: 0, url: '' } },
    javaVersion: { component: 'java-runtime-delta', majorVersion: 21 },
    libraries: [],
    ...overrides
  }
}
