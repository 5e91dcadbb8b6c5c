/**
 * Typed error class for TutorDesk operations.
 */

export type ErrorCode =
  | 'LOAD_ERROR'
  | 'VALIDATION_ERROR'
  | 'DB_ERROR'
  | 'IO_ERROR'
  | 'LLM_ERROR'
  | 'RATE_LIMITED'

export class TutorDeskError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = 'TutorDeskError'
    this.code = code
  }

  /** Corpus or index could not be loaded. Fatal at startup. */
  static load(message: string): TutorDeskError {
    return new TutorDeskError('LOAD_ERROR', message)
  }

  static validation(message: string): TutorDeskError {
    return new TutorDeskError('VALIDATION_ERROR', message)
  }

  static db(message: string): TutorDeskError {
    return new TutorDeskError('DB_ERROR', message)
  }

  static io(message: string): TutorDeskError {
    return new TutorDeskError('IO_ERROR', message)
  }

  static llm(message: string): TutorDeskError {
    return new TutorDeskError('LLM_ERROR', message)
  }

  /** Generator still rate limited after every retry. */
  static rateLimited(message: string): TutorDeskError {
    return new TutorDeskError('RATE_LIMITED', message)
  }
}

/** Message text of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
