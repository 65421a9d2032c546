import { randomUUID } from 'crypto'

export function generateId(): string {
  return randomUUID()
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
