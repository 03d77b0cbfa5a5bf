import OpenAI from 'openai';
import { OpenAIChatCompletionsModel, setTracingDisabled } from '@openai/agents';
import { requireApiKey, type AppConfig } from '../config/env';

export interface ModelTiers {
  /** Cheaper, faster tier used by both guardrails. */
  basic: OpenAIChatCompletionsModel;
  /** More capable tier used by the travel booking agent. */
  premium: OpenAIChatCompletionsModel;
}

/**
 * Build both model tiers on one OpenAI-compatible client.
 * The provider is not OpenAI, so trace export is switched off.
 */
export function createModelTiers(config: AppConfig): ModelTiers {
  const client = new OpenAI({ apiKey: requireApiKey(config), baseURL: config.baseURL });
  setTracingDisabled(true);

  return {
    basic: new OpenAIChatCompletionsModel(client, config.models.gate),
    premium: new OpenAIChatCompletionsModel(client, config.models.responder),
  };
}
