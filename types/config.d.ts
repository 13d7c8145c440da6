import type HttpClient from '../lib/utils/http'
import type { Loader } from './loader'

export interface Config {
  /**
   * The game folder (e.g. `'/home/steve/.minecraft'`). Versions, libraries, assets, natives and
   * runtimes are installed inside it.
   */
  root: string
  /**
   * The version of Minecraft to install (e.g. `'1.21.4'`).
   */
  version: string
  /**
   * [Optional: default is `version` for vanilla, `'<version>-<loader version>'` with a loader]
   * The name of the installed version folder (`versions/<versionName>/`).
   */
  versionName?: string
  /**
   * [Optional: default is `{ type: 'VANILLA' }`]
   * The mod loader to install on top of the vanilla version.
   *
   * @example
   * ```ts
   * loader: { type: 'FABRIC', version: '0.16.9' }
   * loader: { type: 'NEOFORGE', version: '21.4.38' }
   * ```
   */
  loader?: Loader
  /**
   * [Optional] Java runtime configuration.
   */
  java?: {
    /**
     * [Optional: default is `'<runtimeDir>/<component>/bin/java'`]
     * The absolute path to the Java executable used to run loader processors.
     */
    absolutePath?: string
    /**
     * [Optional: default is `'<root>/runtimes'`]
     * The folder where the Java runtimes are installed.
     */
    runtimeDir?: string
  }
  /**
   * [Optional] Download tuning. **Use this option only if you know what you are doing!**
   */
  download?: Partial<DownloadOptions>
  /**
   * [Optional] Remote endpoints, e.g. to use a mirror.
   */
  endpoints?: Partial<Endpoints>
  /**
   * [Optional] HTTP client shared by every request. If not set, a client is created for the
   * duration of `Installer.install()`.
   */
  client?: HttpClient
}

export interface DownloadOptions {
  /**
   * Maximum number of files downloaded at the same time.
   */
  concurrency: number
  /**
   * Number of attempts per file before the whole batch fails.
   */
  attempts: number
  /**
   * Delay between two attempts, in milliseconds.
   */
  retryDelay: number
  /**
   * Abort a download when no data was received for this long, in milliseconds.
   */
  stallTimeout: number
}

export interface Endpoints {
  versionManifest: string
  resources: string
  javaManifest: string
  fabricMeta: string
  fabricMaven: string
  quiltMeta: string
  quiltMaven: string
  forgeMaven: string
  neoforgeMaven: string
}

export interface FullConfig {
  root: string
  version: string
  versionName: string
  loader: Loader
  java: {
    absolutePath: string | null
    runtimeDir: string
  }
  download: DownloadOptions
  endpoints: Endpoints
  client: HttpClient | null
}
