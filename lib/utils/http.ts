/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import fetch from 'node-fetch'
import http from 'node:http'
import https from 'node:https'
import { KilnError, ErrorType } from '../../types/errors'

/**
 * HTTP client shared by metadata requests and downloads. Keeps connections alive between
 * requests; call `destroy()` when done.
 */
export default class HttpClient {
  private readonly headers: Record<string, string>
  private readonly httpAgent = new http.Agent({ keepAlive: true, maxSockets: 32 })
  private readonly httpsAgent = new https.Agent({ keepAlive: true, maxSockets: 32 })

  /**
   * @param headers [Optional] Headers sent with every request (e.g. a custom `User-Agent`).
   */
  constructor(headers: Record<string, string> = {}) {
    this.headers = headers
  }

  /**
   * Send a GET request.
   * @param url The URL to fetch.
   * @param timeout [Optional: default is `0` (none)] Maximum time to wait for the response headers, in milliseconds.
   * @returns The raw response. The body is not consumed.
   */
  async get(url: string, timeout: number = 0) {
    return await fetch(url, {
      agent: url.startsWith('https') ? this.httpsAgent : this.httpAgent,
      headers: this.headers,
      timeout: timeout
    })
  }

  /**
   * Fetch and parse a JSON document.
   * @param url The URL to fetch.
   * @param what Name of the document, used in error messages.
   */
  async getJson<T>(url: string, what: string): Promise<T> {
    let text: string

    try {
      const res = await this.get(url)
      if (!res.ok) {
        throw new KilnError(ErrorType.FETCH_ERROR, `Failed to fetch ${what}: HTTP ${res.status} ${res.statusText}`)
      }
      text = await res.text()
    } catch (err: unknown) {
      if (err instanceof KilnError) throw err
      throw new KilnError(ErrorType.FETCH_ERROR, `Failed to fetch ${what}: ${err instanceof Error ? err.message : err}`)
    }

    try {
      return JSON.parse(text)
    } catch (err: unknown) {
      throw new KilnError(ErrorType.PARSE_ERROR, `Invalid ${what}: ${err instanceof Error ? err.message : err}`)
    }
  }

  /**
   * Close idle connections.
   */
  destroy() {
    this.httpAgent.destroy()
    this.httpsAgent.destroy()
  }
}
