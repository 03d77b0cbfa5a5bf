/**
 * Travel Booking Assistant Type Definitions
 * Shared shapes for the traveller profile, the chat transcript and the turn pipeline
 */

import { z } from 'zod';
import type { ProviderErrorCode } from './errors';

// ============= User Profile Types =============

export const UserProfileSchema = z.object({
  name: z.string().min(1),
  age: z.number().int().nonnegative(),
  departureCity: z.string().min(1),
  budget: z.number().nonnegative(),
  travelHistory: z.array(z.string()),
});

export interface UserProfile {
  readonly name: string;
  readonly age: number;
  readonly departureCity: string;
  readonly budget: number;
  readonly travelHistory: readonly string[];
}

// ============= Conversation Types =============

export type TurnRole = 'user' | 'agent';

export interface Turn {
  readonly role: TurnRole;
  readonly content: string;
}

export type Transcript = readonly Turn[];

// ============= Guardrail Types =============

export interface GateVerdict {
  triggered: boolean;
  reasoning: string;
}

// ============= Pipeline Outcome Types =============

export type PipelineOutcome =
  | { status: 'success'; reply: string }
  | { status: 'blocked_input'; reason: string }
  | { status: 'blocked_output'; reason: string }
  | { status: 'provider_unavailable'; cause: ProviderErrorCode };
