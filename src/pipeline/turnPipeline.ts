import type { Gate } from '../agents/guardrails';
import type { Responder } from '../agents/responder';
import { componentLogger } from '../logger';
import { ProviderError } from '../types/errors';
import type { PipelineOutcome, UserProfile } from '../types/types';

const log = componentLogger('pipeline');

export interface TurnPipelineDeps {
  inputGate: Gate;
  responder: Responder;
  outputGate: Gate;
}

/**
 * Runs one conversation turn:
 * Start -> PreCheck -> (Blocked | Respond) -> PostCheck -> (Blocked | Delivered).
 *
 * The three model calls are sequential; each depends on the previous result.
 * A candidate reply only leaves this class inside a `success` outcome.
 */
export class TurnPipeline {
  constructor(private readonly deps: TurnPipelineDeps) {}

  async process(conversation: string, profile: UserProfile): Promise<PipelineOutcome> {
    try {
      return await this.runStages(conversation, profile);
    } catch (error) {
      if (error instanceof ProviderError) {
        log.warn({ code: error.code, err: error }, `model provider failed: ${error.message}`);
        return { status: 'provider_unavailable', cause: error.code };
      }
      throw error;
    }
  }

  private async runStages(conversation: string, profile: UserProfile): Promise<PipelineOutcome> {
    const { inputGate, responder, outputGate } = this.deps;

    const input = await inputGate.check(conversation, profile);
    if (input.triggered) {
      log.info({ gate: inputGate.name }, 'input blocked');
      return { status: 'blocked_input', reason: input.reasoning };
    }

    const reply = await responder.respond(conversation, profile);

    const output = await outputGate.check(reply, profile);
    if (output.triggered) {
      log.info({ gate: outputGate.name }, 'response blocked');
      return { status: 'blocked_output', reason: output.reasoning };
    }

    log.debug({ replyLength: reply.length }, 'reply delivered');
    return { status: 'success', reply };
  }
}
