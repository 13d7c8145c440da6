/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

/**
 * The error class for Kiln.
 */
export class KilnError extends Error {
  code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = 'KilnError'
    this.code = code
  }
}

export const ErrorType = {
  DOWNLOAD_ERROR: 'DOWNLOAD_ERROR',
  FETCH_ERROR: 'FETCH_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  UNKNOWN_VERSION: 'UNKNOWN_VERSION',
  UNSUPPORTED_ARCHITECTURE: 'UNSUPPORTED_ARCHITECTURE',
  PARSE_ERROR: 'PARSE_ERROR',
  PROCESSOR_ERROR: 'PROCESSOR_ERROR',
  FILE_ERROR: 'FILE_ERROR'
} as const

export type ErrorCode =
  | typeof ErrorType.DOWNLOAD_ERROR
  | typeof ErrorType.FETCH_ERROR
  | typeof ErrorType.NOT_FOUND
  | typeof ErrorType.UNKNOWN_VERSION
  | typeof ErrorType.UNSUPPORTED_ARCHITECTURE
  | typeof ErrorType.PARSE_ERROR
  | typeof ErrorType.PROCESSOR_ERROR
  | typeof ErrorType.FILE_ERROR
