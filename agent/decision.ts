import type { ControlChannel } from '../shared/control-channel.js'
import { toErrorMessage } from '../shared/errors.js'
import type { Logger } from '../shared/logger.js'
import type { FlowSubmission, ResponseDecision } from '../shared/types.js'

/**
 * Submit a flow and wait for its decision. Any failure on the way yields null,
 * which callers treat as "deliver the original response".
 */
export async function awaitDecision(
  channel: ControlChannel,
  submission: FlowSubmission,
  logger: Logger
): Promise<ResponseDecision | null> {
  try {
    const outcome = await channel.submit(submission)
    if (outcome.kind === 'pending') {
      logger.info(`Waiting for inspector to resume ${submission.request.method} ${submission.request.url}`)
    }
    return await outcome.decision
  } catch (err) {
    logger.warn(`Inspector unavailable for ${submission.request.method} ${submission.request.url}, passing through: ${toErrorMessage(err)}`)
    return null
  }
}
