import { Agent, run, type Model } from '@openai/agents';
import { z } from 'zod';
import { componentLogger } from '../logger';
import type { GateVerdict, UserProfile } from '../types/types';
import { AGENT_PROMPTS } from './prompts';
import { callProvider, decodeStructuredOutput, withProfile, type StructuredCall } from './structured';

const log = componentLogger('guardrail');

// Structured replies of the two guardrail agents
export const IllegalAndIrrelevant = z.object({
  is_request_irrelevant_illegal: z.boolean(),
  reasoning: z.string(),
});

export const ControlBookingCriteria = z.object({
  is_response_violates: z.boolean(),
  reasoning: z.string(),
});

export interface Gate {
  readonly name: string;
  check(text: string, profile: UserProfile): Promise<GateVerdict>;
}

/** A gate backed by a guardrail agent whose reply is decoded with `schema`. */
export class AgentGate<TSchema extends z.ZodTypeAny> implements Gate {
  constructor(
    readonly name: string,
    private readonly call: StructuredCall,
    private readonly schema: TSchema,
    private readonly toVerdict: (output: z.infer<TSchema>) => GateVerdict,
  ) {}

  async check(text: string, profile: UserProfile): Promise<GateVerdict> {
    const raw = await callProvider(this.name, this.call, text, profile);
    const verdict = this.toVerdict(decodeStructuredOutput(this.name, this.schema, raw));
    log.debug({ gate: this.name, inputLength: text.length, triggered: verdict.triggered }, 'guardrail verdict');
    return verdict;
  }
}

export const INPUT_GUARDRAIL_NAME = 'input guardrail agent';
export const OUTPUT_GUARDRAIL_NAME = 'output guardrail agent';

export function inputGuardrailFromCall(call: StructuredCall): AgentGate<typeof IllegalAndIrrelevant> {
  return new AgentGate(INPUT_GUARDRAIL_NAME, call, IllegalAndIrrelevant, (output) => ({
    triggered: output.is_request_irrelevant_illegal,
    reasoning: output.reasoning,
  }));
}

export function outputGuardrailFromCall(call: StructuredCall): AgentGate<typeof ControlBookingCriteria> {
  return new AgentGate(OUTPUT_GUARDRAIL_NAME, call, ControlBookingCriteria, (output) => ({
    triggered: output.is_response_violates,
    reasoning: output.reasoning,
  }));
}

/** Pre-Gate: illegal/unsafe destinations, irrelevant or offensive requests. */
export function createInputGuardrail(model: Model): Gate {
  const agent = new Agent<UserProfile, typeof IllegalAndIrrelevant>({
    name: INPUT_GUARDRAIL_NAME,
    instructions: withProfile(AGENT_PROMPTS.INPUT_GUARDRAIL),
    model,
    outputType: IllegalAndIrrelevant,
  });
  return inputGuardrailFromCall(async (input, profile) => {
    const result = await run(agent, input, { context: profile });
    return result.finalOutput;
  });
}

/** Post-Gate: medical/legal advice, bookings confirmed without a cost. */
export function createOutputGuardrail(model: Model): Gate {
  const agent = new Agent<UserProfile, typeof ControlBookingCriteria>({
    name: OUTPUT_GUARDRAIL_NAME,
    instructions: withProfile(AGENT_PROMPTS.OUTPUT_GUARDRAIL),
    model,
    outputType: ControlBookingCriteria,
  });
  return outputGuardrailFromCall(async (input, profile) => {
    const result = await run(agent, input, { context: profile });
    return result.finalOutput;
  });
}
