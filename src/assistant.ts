import { createInputGuardrail, createOutputGuardrail } from './agents/guardrails';
import { createModelTiers } from './agents/models';
import { createTravelResponder } from './agents/responder';
import type { AppConfig } from './config/env';
import { loadUserProfile } from './config/profile';
import { TurnPipeline } from './pipeline/turnPipeline';
import { ChatSession } from './session/chatSession';

/** Wire the profile, both guardrails and the travel agent into one session. */
export function createChatSession(config: AppConfig): ChatSession {
  const profile = loadUserProfile(config.profilePath);
  const { basic, premium } = createModelTiers(config);

  const pipeline = new TurnPipeline({
    inputGate: createInputGuardrail(basic),
    responder: createTravelResponder(premium),
    outputGate: createOutputGuardrail(basic),
  });

  return new ChatSession(pipeline, profile);
}
