import type { ControlChannel, ResumeAck, SubmitOutcome } from '../shared/control-channel.js'
import type { FlowSubmission, MockDecision, ModifiedResponse, RequestDescriptor } from '../shared/types.js'
import type { FlowCoordinator } from './coordinator.js'

/**
 * Control channel for adapters running in the same process as the coordinator.
 */
export class LocalControlChannel implements ControlChannel {
  constructor(private readonly coordinator: FlowCoordinator) {}

  submit(submission: FlowSubmission): Promise<SubmitOutcome> {
    return this.coordinator.submit(submission)
  }

  async resume(flowId: string, modified: ModifiedResponse | null): Promise<ResumeAck> {
    this.coordinator.resume(flowId, modified)
    return { flowId, status: 'resumed' }
  }

  async queryMock(descriptor: RequestDescriptor): Promise<MockDecision | null> {
    return this.coordinator.queryMock(descriptor)
  }
}
