import type { FlowSubmission, MockDecision, ModifiedResponse, RequestDescriptor, ResponseDecision } from './types.js'

export type SubmitOutcome =
  | { kind: 'decided'; flowId: string; decision: ResponseDecision }
  | { kind: 'pending'; flowId: string; decision: Promise<ResponseDecision> }

export interface ResumeAck {
  flowId: string
  status: 'resumed'
}

/**
 * How a transport adapter talks to the coordinator. Implementations exist for
 * the same process and for HTTP; the coordinator cannot tell them apart.
 */
export interface ControlChannel {
  submit(submission: FlowSubmission): Promise<SubmitOutcome>
  /** Rejects with UnknownFlowError or AlreadyResumedError */
  resume(flowId: string, modified: ModifiedResponse | null): Promise<ResumeAck>
  queryMock(descriptor: RequestDescriptor): Promise<MockDecision | null>
}
