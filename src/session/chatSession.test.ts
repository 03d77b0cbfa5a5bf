import { describe, expect, it, vi } from 'vitest';
import { createUserProfile } from '../config/profile';
import type { PipelineOutcome, UserProfile } from '../types/types';
import { ErrorCodes } from '../types/errors';
import { ChatSession } from './chatSession';

const profile = createUserProfile({
  name: 'Test Traveller',
  age: 52,
  departureCity: 'Tokyo',
  budget: 1000,
  travelHistory: ['France'],
});

function scriptedPipeline(outcomes: PipelineOutcome[]) {
  const process = vi.fn(async (_conversation: string, _profile: UserProfile) => {
    const next = outcomes.shift();
    if (!next) throw new Error('no scripted outcome left');
    return next;
  });
  return { process };
}

describe('ChatSession', () => {
  it('appends one user turn and one agent turn per submit', async () => {
    const pipeline = scriptedPipeline([
      { status: 'success', reply: 'Where would you like to go?' },
      { status: 'blocked_input', reason: 'Off-topic.' },
      { status: 'blocked_output', reason: 'Missing cost.' },
    ]);
    const session = new ChatSession(pipeline, profile);

    await session.submit('Hi there');
    await session.submit('Tell me a joke');
    await session.submit('Book Seoul');

    expect(session.turns).toEqual([
      { role: 'user', content: 'Hi there' },
      { role: 'agent', content: 'Where would you like to go?' },
      { role: 'user', content: 'Tell me a joke' },
      { role: 'agent', content: 'Request Blocked: Off-topic.' },
      { role: 'user', content: 'Book Seoul' },
      { role: 'agent', content: 'Response Blocked: Missing cost.' },
    ]);
  });

  it('sends the whole serialized transcript, new message included', async () => {
    const pipeline = scriptedPipeline([
      { status: 'success', reply: 'b' },
      { status: 'success', reply: 'd' },
    ]);
    const session = new ChatSession(pipeline, profile);

    await session.submit('a');
    await session.submit('  c  ');

    expect(pipeline.process).toHaveBeenNthCalledWith(1, 'User: a', profile);
    expect(pipeline.process).toHaveBeenNthCalledWith(2, 'User: a\nAgent: b\nUser: c', profile);
  });

  it('returns the pipeline outcome', async () => {
    const session = new ChatSession(
      scriptedPipeline([{ status: 'provider_unavailable', cause: ErrorCodes.MALFORMED_OUTPUT }]),
      profile,
    );

    await expect(session.submit('hello')).resolves.toEqual({
      status: 'provider_unavailable',
      cause: ErrorCodes.MALFORMED_OUTPUT,
    });
    expect(session.turns[1]).toEqual({
      role: 'agent',
      content: 'Agent Unavailable: the travel assistant could not produce a reply (MALFORMED_OUTPUT). Please try again.',
    });
  });

  it('rejects an empty message without touching the transcript', async () => {
    const pipeline = scriptedPipeline([]);
    const session = new ChatSession(pipeline, profile);

    await expect(session.submit('   ')).rejects.toMatchObject({ code: ErrorCodes.EMPTY_MESSAGE });
    expect(session.turns).toEqual([]);
    expect(pipeline.process).not.toHaveBeenCalled();
  });

  it('refuses a second message while a turn is in flight', async () => {
    let finish: (outcome: PipelineOutcome) => void = () => {};
    const pending = new Promise<PipelineOutcome>((resolve) => {
      finish = resolve;
    });
    const session = new ChatSession({ process: () => pending }, profile);

    const first = session.submit('first');
    expect(session.busy).toBe(true);
    await expect(session.submit('second')).rejects.toMatchObject({ code: ErrorCodes.TURN_IN_PROGRESS });

    finish({ status: 'success', reply: 'done' });
    await first;
    expect(session.busy).toBe(false);
    expect(session.turns.map((t) => t.content)).toEqual(['first', 'done']);
  });

  it('clears the busy flag when the pipeline throws', async () => {
    const session = new ChatSession(scriptedPipeline([]), profile);

    await expect(session.submit('hello')).rejects.toThrow('no scripted outcome left');
    expect(session.busy).toBe(false);
    expect(session.turns).toEqual([{ role: 'user', content: 'hello' }]);
  });

  it('hands out copies of the transcript', async () => {
    const session = new ChatSession(scriptedPipeline([{ status: 'success', reply: 'ok' }]), profile);
    await session.submit('hi');

    const snapshot = session.turns;
    await expect(session.submit('again')).rejects.toThrow();
    expect(snapshot).toHaveLength(2);
  });
});
