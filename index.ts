/**
 * @license MIT
 * @copyright Copyright (c) 2025, GoldFrite
 */

import Installer from './lib/launcher/installer'
import LoaderManager from './lib/launcher/loadermanager'
import FilesManager from './lib/launcher/filesmanager'
import Patcher from './lib/launcher/loaders/patcher'
import Java from './lib/java/java'
import Downloader from './lib/utils/downloader'
import HttpClient from './lib/utils/http'
import extractor from './lib/utils/extractor'
import utils from './lib/utils/utils'

export { Installer, LoaderManager, FilesManager, Patcher, Java, Downloader, HttpClient, extractor, utils }
export default { Installer, LoaderManager, FilesManager, Patcher, Java, Downloader, HttpClient, extractor, utils }

export { DEFAULT_ENDPOINTS } from './lib/launcher/installer'
export { DEFAULT_DOWNLOAD_OPTIONS } from './lib/utils/downloader'
export { DEFAULT_JAVA_VERSION } from './lib/java/java'

export type * from './types/config'
export * from './types/errors'
export type * from './types/events'
export type * from './types/file'
export type * from './types/loader'
export type * from './types/manifest'
