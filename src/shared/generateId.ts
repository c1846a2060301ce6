/**
 * ID helpers on crypto.randomUUID
 */

import { randomUUID } from 'crypto'

export function generateId(): string {
  return randomUUID()
}

// Request ids only need to be unique within a log window
export function generateRequestId(): string {
  return `req-${Date.now().toString(36)}-${randomUUID().slice(0, 8)}`
}
