import fs from 'node:fs';
import path from 'node:path';
import { ErrorCodes, TravelAgentError, describeError } from '../types/errors';
import { UserProfileSchema, type UserProfile } from '../types/types';

/** Validate raw profile data and return a deep-frozen copy. */
export function createUserProfile(raw: unknown): UserProfile {
  const parsed = UserProfileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TravelAgentError('Invalid traveller profile', ErrorCodes.INVALID_PROFILE, parsed.error.issues);
  }
  const { travelHistory, ...rest } = parsed.data;
  return Object.freeze({ ...rest, travelHistory: Object.freeze([...travelHistory]) });
}

export function loadUserProfile(profilePath: string): UserProfile {
  const file = path.resolve(process.cwd(), profilePath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    throw new TravelAgentError(
      `Could not read traveller profile at ${file}: ${describeError(error)}`,
      ErrorCodes.INVALID_PROFILE,
      undefined,
      { cause: error },
    );
  }
  return createUserProfile(raw);
}

// Compact snapshot embedded into agent instructions
export function profileSnapshot(profile: UserProfile): string {
  return [
    `Name: ${profile.name}`,
    `Age: ${profile.age}`,
    `Departure city: ${profile.departureCity}`,
    `Budget: $${profile.budget}`,
    `Travel history: ${profile.travelHistory.length ? profile.travelHistory.join(', ') : 'none'}`,
  ].join('\n');
}
