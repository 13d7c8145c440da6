import type { Artifact, Arguments, DataVariable, ProcessorStep } from './manifest'

export type LoaderType = 'VANILLA' | 'FABRIC' | 'QUILT' | 'FORGE' | 'NEOFORGE'

/**
 * The loader to install on top of the vanilla version.
 */
export type Loader = { type: 'VANILLA' } | { [T in ModLoaderType]: { type: T; version: string } }[ModLoaderType]

export type ModLoaderType = Exclude<LoaderType, 'VANILLA'>

export interface LoaderLibrary {
  name: string
  /**
   * Maven repository base URL.
   */
  url?: string
  sha1?: string
  size?: number
  md5?: string
  sha256?: string
  sha512?: string
  downloads?: { artifact?: Artifact }
}

/**
 * Fabric/Quilt profile JSON, and the `version.json` of Forge-like installers.
 */
export interface LoaderProfile {
  id: string
  inheritsFrom?: string
  releaseTime?: string
  time?: string
  type?: string
  mainClass: string
  arguments?: Partial<Arguments>
  /**
   * Legacy (pre-1.13) game arguments, replacing the vanilla ones.
   */
  minecraftArguments?: string
  libraries: LoaderLibrary[]
}

/**
 * `install_profile.json` of Forge-like installers.
 */
export interface InstallProfile {
  spec?: number
  version?: string
  path?: string
  minecraft?: string
  json?: string
  data?: Record<string, DataVariable>
  processors?: ProcessorStep[]
  libraries: LoaderLibrary[]
  mirrorList?: string
}

/**
 * `install_profile.json` of Forge installers for 1.12.2 and older.
 */
export interface LegacyInstallProfile {
  install: {
    path: string
    filePath: string
    version?: string
    minecraft?: string
  }
  versionInfo: LoaderProfile
}

export interface FabricLikeLoaderVersion {
  separator?: string
  build?: number
  maven: string
  version: string
  stable?: boolean
}

export interface FabricLikeGameVersion {
  version: string
  stable: boolean
}
