import type { FileType } from './file'
import type { LoaderType } from './loader'

export interface InstallerEvents {
  install_resolve: [{ version: string }]
  install_merge_loader: [{ type: LoaderType; version: string | null }]
  install_check: [{ amount: number }]
  install_download: [{ total: { amount: number; size: number } }]
  install_copy_assets: []
  install_extract_natives: [{ amount: number }]
  install_patch_loader: [{ amount: number }]
  install_end: [{ version: string }]
  install_debug: [string]
}

export interface DownloaderEvents {
  /**
   * Emitted after every chunk of a single file.
   */
  download_progress: [{ path: string; downloaded: number; total: number }]
  /**
   * Emitted after every file of a batch.
   */
  download_batch_progress: [{ path: string; downloaded: number; total: number; type: FileType }]
  /**
   * Emitted when an attempt fails. The file may still be retried.
   */
  download_error: [{ path: string; type: FileType; attempt: number; message: string }]
  download_end: [{ amount: number }]
}

export interface FilesManagerEvents {
  check_end: [{ checked: number; broken: number }]
  extract_progress: [{ filename: string }]
  extract_end: [{ amount: number }]
  copy_progress: [{ filename: string; dest: string }]
  copy_error: [{ filename: string; message: string }]
  copy_end: [{ amount: number }]
}

export interface LoaderEvents {
  loader_debug: [string]
  loader_extract_error: [{ filename: string; message: string }]
}

export interface PatcherEvents {
  patch_progress: [{ filename: string; index: number }]
  patch_skip: [{ filename: string; reason: 'side' | 'done' }]
  patch_end: [{ amount: number }]
  patch_debug: [string]
}
