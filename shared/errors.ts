export type FlowErrorCode =
  | 'UNKNOWN_FLOW'
  | 'INVALID_STATE'
  | 'ALREADY_RESUMED'
  | 'MALFORMED_PAYLOAD'
  | 'UNKNOWN_RULE'

export class FlowError extends Error {
  readonly code: FlowErrorCode

  constructor(code: FlowErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

export class UnknownFlowError extends FlowError {
  constructor(readonly flowId: string) {
    super('UNKNOWN_FLOW', `Unknown flow: ${flowId}`)
  }
}

export class InvalidStateError extends FlowError {
  constructor(readonly flowId: string, readonly state: string, readonly operation: string) {
    super('INVALID_STATE', `Cannot ${operation} flow ${flowId} in state ${state}`)
  }
}

export class AlreadyResumedError extends FlowError {
  constructor(readonly flowId: string) {
    super('ALREADY_RESUMED', `Flow ${flowId} was already resumed`)
  }
}

export class MalformedPayloadError extends FlowError {
  constructor(message: string) {
    super('MALFORMED_PAYLOAD', message)
  }
}

export class UnknownRuleError extends FlowError {
  constructor(readonly ruleId: string) {
    super('UNKNOWN_RULE', `Unknown mock rule: ${ruleId}`)
  }
}

/**
 * Extract a human-readable message from an unknown error value.
 */
export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  if (typeof err === 'string') return err
  return String(err)
}
