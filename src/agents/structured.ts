import type { RunContext } from '@openai/agents';
import { z } from 'zod';
import { profileSnapshot } from '../config/profile';
import { ErrorCodes, ProviderError, TravelAgentError, describeError } from '../types/errors';
import type { UserProfile } from '../types/types';

/**
 * One model-backed call with a structured reply: prompt text in, the runtime's
 * final output out. The value is untrusted until it has been decoded.
 */
export type StructuredCall = (input: string, profile: UserProfile) => Promise<unknown>;

/** Appends the traveller profile snapshot to static instructions. */
export function withProfile(instructions: string) {
  return (runContext: RunContext<UserProfile>): string =>
    `${instructions.trim()}\n\n[Traveller Profile]\n${profileSnapshot(runContext.context)}\n`;
}

export async function callProvider(
  agentName: string,
  call: StructuredCall,
  input: string,
  profile: UserProfile,
): Promise<unknown> {
  try {
    return await call(input, profile);
  } catch (error) {
    if (error instanceof TravelAgentError) throw error;
    throw new ProviderError(`${agentName} call failed: ${describeError(error)}`, ErrorCodes.PROVIDER_UNAVAILABLE, {
      cause: error,
    });
  }
}

export function decodeStructuredOutput<TSchema extends z.ZodTypeAny>(
  agentName: string,
  schema: TSchema,
  raw: unknown,
): z.infer<TSchema> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ProviderError(`${agentName} returned a reply that does not match its schema`, ErrorCodes.MALFORMED_OUTPUT, {
      details: parsed.error.issues,
    });
  }
  return parsed.data;
}
