import type { PipelineOutcome, Transcript, Turn, TurnRole } from '../types/types';

const ROLE_LABELS: Record<TurnRole, string> = {
  user: 'User',
  agent: 'Agent',
};

export function createTurn(role: TurnRole, content: string): Turn {
  return Object.freeze({ role, content });
}

/** Combine the full conversation into one prompt: one "Role: content" line per turn. */
export function serializeTranscript(turns: Transcript): string {
  let conversation = '';
  for (const turn of turns) {
    conversation += `${ROLE_LABELS[turn.role]}: ${turn.content}\n`;
  }
  return conversation.trim();
}

/** The agent turn shown to the user for a finished pipeline run. */
export function outcomeToAgentText(outcome: PipelineOutcome): string {
  switch (outcome.status) {
    case 'success':
      return outcome.reply;
    case 'blocked_input':
      return `Request Blocked: ${outcome.reason}`;
    case 'blocked_output':
      return `Response Blocked: ${outcome.reason}`;
    case 'provider_unavailable':
      return `Agent Unavailable: the travel assistant could not produce a reply (${outcome.cause}). Please try again.`;
  }
}
