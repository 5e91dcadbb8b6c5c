/**
 * Anonymized session identifier: first 16 hex chars of SHA-256 over the session id.
 */

import { createHash } from 'node:crypto'

export function hashSessionId(sessionId: string): string {
  return createHash('sha256').update(sessionId).digest('hex').slice(0, 16)
}
