/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import type { File } from '../../types/file'
import type { DownloadOptions } from '../../types/config'
import fsSync from 'node:fs'
import fs from 'node:fs/promises'
import path_ from 'node:path'
import { Readable } from 'node:stream'
import EventEmitter from '../utils/events'
import type { DownloaderEvents } from '../../types/events'
import HttpClient from './http'
import { KilnError, ErrorType } from '../../types/errors'

export const DEFAULT_DOWNLOAD_OPTIONS: DownloadOptions = {
  concurrency: 10,
  attempts: 3,
  retryDelay: 5000,
  stallTimeout: 10000
}

export default class Downloader extends EventEmitter<DownloaderEvents> {
  private readonly client: HttpClient
  private readonly options: DownloadOptions

  /**
   * @param client The HTTP client used for every download.
   * @param options [Optional] Concurrency, retries and stall detection settings.
   */
  constructor(client: HttpClient, options: Partial<DownloadOptions> = {}) {
    super()
    this.client = client
    this.options = { ...DEFAULT_DOWNLOAD_OPTIONS, ...options }
  }

  /**
   * Download many files. At most `concurrency` files are downloaded at the same time, and each
   * file is tried `attempts` times. The first file that still fails stops the batch: no other
   * file is started, and the error is thrown once the running downloads are over.
   * @param files Files to download (already known to be missing or broken).
   */
  async downloadMany(files: File[]) {
    const queue = [...files]
    let downloaded = 0
    let failure: unknown = null

    const workers = Array(Math.min(this.options.concurrency, queue.length))
      .fill(null)
      .map(async () => {
        while (queue.length > 0 && failure === null) {
          const file = queue.shift()
          if (!file) break
          try {
            await this.downloadWithRetry(file)
          } catch (err) {
            if (failure === null) failure = err
            return
          }
          downloaded++
          this.emit('download_batch_progress', { path: file.path, downloaded: downloaded, total: files.length, type: file.type })
        }
      })

    await Promise.all(workers)

    if (failure !== null) throw failure

    this.emit('download_end', { amount: downloaded })
  }

  private async downloadWithRetry(file: File) {
    for (let attempt = 1; ; attempt++) {
      try {
        await this.download(file.url, file.path)
        if (file.executable && process.platform !== 'win32') await fs.chmod(file.path, 0o755)
        return
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : `${err}`
        this.emit('download_error', { path: file.path, type: file.type, attempt: attempt, message: message })

        if (attempt >= this.options.attempts) {
          throw new KilnError(ErrorType.DOWNLOAD_ERROR, `Failed to download ${file.name} after ${attempt} attempts: ${message}`)
        }
        await new Promise((r) => setTimeout(r, this.options.retryDelay))
      }
    }
  }

  /**
   * Download a single file.
   * @param url The URL of the file.
   * @param destination The absolute path to write the file to. Parent folders are created.
   * @returns The number of bytes written.
   */
  async download(url: string, destination: string) {
    const stallTimeout = this.options.stallTimeout

    await fs.mkdir(path_.dirname(destination), { recursive: true })

    const res = await this.client.get(url, stallTimeout).catch((err: unknown) => {
      throw new KilnError(ErrorType.DOWNLOAD_ERROR, `Error while fetching ${url}: ${err instanceof Error ? err.message : err}`)
    })

    if (!res.ok) {
      res.body.resume()
      throw new KilnError(ErrorType.DOWNLOAD_ERROR, `Error while fetching ${url}: HTTP ${res.status} ${res.statusText}`)
    }

    const body = res.body
    const total = parseInt(res.headers.get('content-length') ?? '0', 10) || 0
    const stream = fsSync.createWriteStream(destination)
    let downloaded = 0

    return new Promise<number>((resolve, reject) => {
      let timer: NodeJS.Timeout | null = null

      const cleanup = () => {
        if (timer) clearTimeout(timer)
        body.removeAllListeners('data')
        body.removeAllListeners('end')
        body.removeAllListeners('error')
        stream.removeAllListeners()
      }

      const fail = (err: KilnError) => {
        cleanup()
        if (body instanceof Readable) body.destroy()
        stream.destroy()
        fs.rm(destination, { force: true }).then(
          () => reject(err),
          () => reject(err)
        )
      }

      const armStallTimer = () => {
        if (timer) clearTimeout(timer)
        timer = setTimeout(() => {
          fail(new KilnError(ErrorType.DOWNLOAD_ERROR, `Connection stalled, no data received for ${stallTimeout / 1000}s: ${url}`))
        }, stallTimeout)
      }

      armStallTimer()

      body.on('data', (chunk: Buffer) => {
        armStallTimer()
        stream.write(chunk)
        downloaded += chunk.length
        this.emit('download_progress', { path: destination, downloaded: downloaded, total: total })
      })

      body.on('end', () => {
        if (timer) clearTimeout(timer)
        stream.end()
      })

      body.on('error', (err) => {
        fail(new KilnError(ErrorType.DOWNLOAD_ERROR, `Error while downloading ${url}: ${err.message}`))
      })

      stream.on('finish', () => {
        cleanup()
        resolve(downloaded)
      })

      stream.on('error', (err) => {
        fail(new KilnError(ErrorType.DOWNLOAD_ERROR, `Error while writing ${destination}: ${err.message}`))
      })
    })
  }
}
