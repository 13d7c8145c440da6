/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import type { File } from '../../types/file'
import type { FullConfig } from '../../types/config'
import type { JavaFileManifest, JavaManifest, JavaVersion } from '../../types/manifest'
import path_ from 'node:path'
import HttpClient from '../utils/http'
import { KilnError, ErrorType } from '../../types/errors'

/**
 * Runtime used by versions that do not declare one.
 */
export const DEFAULT_JAVA_VERSION: JavaVersion = { component: 'jre-legacy', majorVersion: 8 }

/**
 * Install the Java runtime required by a Minecraft version, from Mojang's runtime manifest.
 *
 * @example
 * ```typescript
 * const java = new Java(config, client, version.javaVersion)
 * const files = await java.getFiles()
 * const exec = java.getJavaPath()
 * ```
 */
export default class Java {
  private readonly config: FullConfig
  private readonly client: HttpClient
  private readonly javaVersion: JavaVersion

  /**
   * @param config The installer configuration.
   * @param client The HTTP client used to fetch the runtime manifests.
   * @param javaVersion [Optional: default is `jre-legacy` (Java 8)] The runtime declared by the version.
   */
  constructor(config: FullConfig, client: HttpClient, javaVersion: JavaVersion = DEFAULT_JAVA_VERSION) {
    this.config = config
    this.client = client
    this.javaVersion = javaVersion
  }

  /**
   * Get the key of a platform in the runtime manifest.
   * @param platform [Optional: default is the current platform] A Node.js platform.
   * @param arch [Optional: default is the current architecture] A Node.js architecture.
   * @param majorVersion [Optional: default is `8`] The Java major version.
   * @returns The key (e.g. `'linux'`, `'windows-x64'`, `'mac-os-arm64'`).
   */
  static getManifestKey(platform: NodeJS.Platform = process.platform, arch: string = process.arch, majorVersion: number = 8) {
    const os = platform === 'win32' ? 'windows' : platform === 'darwin' ? 'mac-os' : 'linux'

    let runtimeArch: string
    switch (arch) {
      case 'ia32':
        runtimeArch = os === 'linux' ? 'i386' : 'x86'
        break
      case 'x64':
      case 'arm64':
        runtimeArch = arch
        break
      default:
        throw new KilnError(ErrorType.UNSUPPORTED_ARCHITECTURE, `Unsupported architecture for Java runtimes: ${arch}`)
    }

    if (os === 'linux' && runtimeArch !== 'i386') return 'linux'
    // Java 8 has no arm64 build on macOS
    if (os === 'mac-os' && (runtimeArch !== 'arm64' || majorVersion === 8)) return 'mac-os'
    return `${os}-${runtimeArch}`
  }

  /**
   * Get the URL of the file manifest of the runtime.
   */
  async getManifestUrl() {
    const manifest = await this.client.getJson<JavaManifest>(this.config.endpoints.javaManifest, 'Java runtimes manifest')
    const key = Java.getManifestKey(process.platform, process.arch, this.javaVersion.majorVersion)

    const platform = manifest[key]
    if (!platform) {
      throw new KilnError(ErrorType.NOT_FOUND, `No Java runtime for platform '${key}'`)
    }

    const builds = platform[this.javaVersion.component]
    if (!builds || builds.length === 0) {
      throw new KilnError(ErrorType.NOT_FOUND, `No Java runtime '${this.javaVersion.component}' for platform '${key}'`)
    }

    return builds[0].manifest.url
  }

  /**
   * Get the files of the runtime, installed in `<runtimeDir>/<component>/`. Folders are created
   * by the downloader, and links are ignored.
   */
  async getFiles(): Promise<File[]> {
    const url = await this.getManifestUrl()
    const manifest = await this.client.getJson<JavaFileManifest>(url, `Java runtime '${this.javaVersion.component}' manifest`)
    const root = path_.join(this.config.java.runtimeDir, this.javaVersion.component)

    const files: File[] = []

    Object.entries(manifest.files).forEach(([name, file]) => {
      if (file.type !== 'file' || !file.downloads) return

      files.push({
        name: name,
        path: path_.join(root, name),
        url: file.downloads.raw.url,
        sha1: file.downloads.raw.sha1,
        size: file.downloads.raw.size,
        type: 'JAVA',
        executable: file.executable === true
      })
    })

    return files
  }

  /**
   * Get the path to the Java executable. `java.absolutePath` of the configuration takes priority.
   */
  getJavaPath() {
    if (this.config.java.absolutePath) return this.config.java.absolutePath

    const root = path_.join(this.config.java.runtimeDir, this.javaVersion.component)
    switch (process.platform) {
      case 'win32':
        return path_.join(root, 'bin', 'javaw.exe')
      case 'darwin':
        return path_.join(root, 'jre.bundle', 'Contents', 'Home', 'bin', 'java')
      default:
        return path_.join(root, 'bin', 'java')
    }
  }
}
