import { profileSnapshot } from '../config/profile';
import type { Turn } from '../types/types';
import type { ChatSession } from './chatSession';

export function formatTurn(turn: Turn): string {
  return `${turn.role === 'user' ? 'you' : 'agent'}> ${turn.content}`;
}

/**
 * Handle one line of terminal input. Returns the text to print, or null when
 * the user asked to quit.
 */
export async function handleLine(session: ChatSession, line: string): Promise<string | null> {
  const q = line.trim();
  if (!q) return '';
  if (q.toLowerCase() === 'exit') return null;
  if (q === '/profile') return profileSnapshot(session.profile);
  if (q === '/history') {
    return session.turns.length ? session.turns.map(formatTurn).join('\n') : '(no messages yet)';
  }

  await session.submit(q);
  const turns = session.turns;
  return formatTurn(turns[turns.length - 1]);
}
