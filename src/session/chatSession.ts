import type { TurnPipeline } from '../pipeline/turnPipeline';
import { componentLogger } from '../logger';
import { ErrorCodes, TravelAgentError } from '../types/errors';
import type { PipelineOutcome, Transcript, Turn, UserProfile } from '../types/types';
import { createTurn, outcomeToAgentText, serializeTranscript } from './transcript';

const log = componentLogger('session');

/**
 * Holds one traveller's transcript across turns. Only one turn may be in
 * flight; the transcript is append-only and never edited.
 */
export class ChatSession {
  private readonly history: Turn[] = [];
  private inFlight = false;

  constructor(
    private readonly pipeline: Pick<TurnPipeline, 'process'>,
    readonly profile: UserProfile,
  ) {}

  get turns(): Transcript {
    return [...this.history];
  }

  get busy(): boolean {
    return this.inFlight;
  }

  async submit(message: string): Promise<PipelineOutcome> {
    const text = message.trim();
    if (!text) {
      throw new TravelAgentError('Message is empty', ErrorCodes.EMPTY_MESSAGE);
    }
    if (this.inFlight) {
      throw new TravelAgentError('A reply is still being prepared', ErrorCodes.TURN_IN_PROGRESS);
    }

    this.inFlight = true;
    try {
      this.history.push(createTurn('user', text));
      const outcome = await this.pipeline.process(serializeTranscript(this.history), this.profile);
      this.history.push(createTurn('agent', outcomeToAgentText(outcome)));
      log.info({ status: outcome.status, turns: this.history.length }, 'turn finished');
      return outcome;
    } finally {
      this.inFlight = false;
    }
  }
}
