export type OSName = 'windows' | 'osx' | 'linux'

export interface VersionManifest {
  latest: { release: string; snapshot: string }
  versions: {
    id: string
    type: string
    url: string
    time?: string
    releaseTime?: string
    sha1?: string
  }[]
}

/**
 * Resolved version metadata. Starts as the vanilla version document, is extended in place by
 * the active loader, and is persisted as `versions/<name>/<name>.json`.
 */
export interface VersionDescriptor {
  id: string
  inheritsFrom?: string
  type?: string
  time?: string
  releaseTime?: string
  mainClass: string
  arguments?: Arguments
  /**
   * Legacy (pre-1.13) space-separated game arguments.
   */
  minecraftArguments?: string
  assetIndex: {
    id: string
    sha1: string
    size: number
    totalSize?: number
    url: string
  }
  assets: string
  downloads: {
    client: Artifact
    client_mappings?: Artifact
    server?: Artifact
    server_mappings?: Artifact
  }
  javaVersion?: JavaVersion
  libraries: Library[]
  /**
   * Installer data variables, set by Forge-like loaders.
   */
  data?: Record<string, DataVariable>
  /**
   * Post-install processors, set by Forge-like loaders. Order is execution order.
   */
  processors?: ProcessorStep[]
}

export interface Arguments {
  game: ArgumentToken[]
  jvm: ArgumentToken[]
}

export type ArgumentToken = string | { rules: Rule[]; value: string | string[] }

export interface JavaVersion {
  component: string
  majorVersion: number
}

export interface Artifact {
  path?: string
  sha1: string
  size: number
  url: string
}

export interface Library {
  name: string
  downloads?: {
    artifact?: Artifact
    classifiers?: Record<string, Artifact>
  }
  natives?: Partial<Record<OSName, string>>
  extract?: { exclude: string[] }
  rules?: Rule[]
  /**
   * Loader installer libraries only needed by processors, not by the game classpath.
   */
  skipArgs?: boolean
}

export interface Rule {
  action: 'allow' | 'disallow'
  os?: { name?: OSName; arch?: string; version?: string }
  features?: Record<string, boolean>
}

export interface DataVariable {
  client: string
  server: string
}

export interface ProcessorStep {
  jar: string
  classpath: string[]
  args: string[]
  sides?: string[]
  outputs?: Record<string, string>
  /**
   * Set once the processor exited successfully and the descriptor was saved.
   */
  success?: boolean
}

export interface AssetIndex {
  objects: Record<string, { hash: string; size: number }>
  virtual?: boolean
  map_to_resources?: boolean
}

/**
 * Runtime manifest: platform (e.g. `linux`, `windows-x64`) → component → builds.
 */
export type JavaManifest = Record<
  string,
  Record<
    string,
    {
      availability?: { group: number; progress: number }
      manifest: { sha1: string; size: number; url: string }
      version?: { name: string; released: string }
    }[]
  >
>

export interface JavaFileManifest {
  files: Record<
    string,
    {
      type: 'file' | 'directory' | 'link'
      executable?: boolean
      target?: string
      downloads?: {
        raw: Artifact
        lzma?: Artifact
      }
    }
  >
}
