import { Agent, run, type Model } from '@openai/agents';
import { z } from 'zod';
import { componentLogger } from '../logger';
import type { UserProfile } from '../types/types';
import { AGENT_PROMPTS } from './prompts';
import { callProvider, decodeStructuredOutput, withProfile, type StructuredCall } from './structured';

const log = componentLogger('responder');

export const MessageOutput = z.object({
  response: z.string(),
});

export interface Responder {
  respond(conversation: string, profile: UserProfile): Promise<string>;
}

export const TRAVEL_AGENT_NAME = 'travel booking agent';

export class AgentResponder implements Responder {
  constructor(private readonly call: StructuredCall) {}

  async respond(conversation: string, profile: UserProfile): Promise<string> {
    const raw = await callProvider(TRAVEL_AGENT_NAME, this.call, conversation, profile);
    const { response } = decodeStructuredOutput(TRAVEL_AGENT_NAME, MessageOutput, raw);
    log.debug({ promptLength: conversation.length, replyLength: response.length }, 'candidate reply ready');
    return response;
  }
}

export function createTravelResponder(model: Model): Responder {
  const agent = new Agent<UserProfile, typeof MessageOutput>({
    name: TRAVEL_AGENT_NAME,
    instructions: withProfile(AGENT_PROMPTS.TRAVEL_BOOKING),
    model,
    outputType: MessageOutput,
  });
  return new AgentResponder(async (input, profile) => {
    const result = await run(agent, input, { context: profile });
    return result.finalOutput;
  });
}
