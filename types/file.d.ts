export interface File {
  /**
   * The logical name of the file (asset key, library file name, runtime-relative path...).
   */
  name: string
  /**
   * The absolute destination path of the file.
   */
  path: string
  /**
   * The URL to download the file. Files with an empty URL are never downloaded.
   */
  url: string
  /**
   * The SHA1 hash of the file. When empty, the file is valid as soon as it exists.
   */
  sha1?: string
  /**
   * The size of the file in bytes.
   */
  size?: number
  /**
   * The type of the file.
   *
   * `'ASSET'`: Minecraft asset
   *
   * `'LIBRARY'`: Minecraft or loader library, client jar
   *
   * `'JAVA'`: Java runtime file
   *
   * `'CUSTOM'`: Other files (loader installers...)
   */
  type: FileType
  executable?: boolean
}

export type FileType = 'ASSET' | 'LIBRARY' | 'JAVA' | 'CUSTOM'

/**
 * A native classifier jar to unpack into the natives folder once downloaded.
 */
export interface NativeFile extends File {
  exclude: string[]
}
