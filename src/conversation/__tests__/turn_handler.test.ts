/**
 * @fileoverview Tests for conversational turn handling
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { TurnHandler, type RecommendationSource } from '../turn_handler.js';
import {
  FAILURE_REPLY,
  HELP_REPLY,
  NOTHING_FOUND_REPLY,
  NO_INPUT_REPLY,
  RESET_REPLY,
  UNSUPPORTED_REPLY,
  formatRecommendations,
} from '../replies.js';
import type { RecommendationResponse } from '../../pipeline/recommender.js';
import type { SessionView } from '../../session/session.js';
import { SessionManager } from '../../session/session_manager.js';
import { unsafeEntityId, type EntityId } from '../../core/contracts.js';

const id = (raw: string): EntityId => unsafeEntityId(raw);

const OK_RESPONSE: RecommendationResponse = {
  status: 'ok',
  recommendations: [
    { id: id('M2'), label: 'Second Movie', score: 2, reason: "shares the genre 'drama'" },
    { id: id('M3'), label: 'Third Movie', score: 1, reason: "it's similar to movies you like" },
  ],
  degradations: [],
};

describe('formatRecommendations', () => {
  it('lists each recommendation with its reason', () => {
    expect(formatRecommendations(OK_RESPONSE.status === 'ok' ? OK_RESPONSE.recommendations : [])).toBe(
      [
        'Here are a few recommendations:',
        "- **Second Movie**: shares the genre 'drama'",
        "- **Third Movie**: it's similar to movies you like",
      ].join('\n')
    );
  });
});

function recommenderMock() {
  return vi.fn(async (_session: SessionView, _k?: number): Promise<RecommendationResponse> => OK_RESPONSE);
}

describe('TurnHandler', () => {
  let sessions: SessionManager;
  let getRecommendations: ReturnType<typeof recommenderMock>;
  let handler: TurnHandler;

  beforeEach(() => {
    sessions = new SessionManager();
    getRecommendations = recommenderMock();
    const recommender: RecommendationSource = { getRecommendations };
    handler = new TurnHandler(sessions, recommender, { topK: 5 });
  });

  it('recommends, remembers the results and records the turn', async () => {
    const result = await handler.handleTurn('u1', {
      text: 'Recommend something like Seed Movie',
      intent: { intent: 'recommendation', seedEntities: [id('M1')] },
    });

    expect(result.kind).toBe('recommendation');
    expect(result.reply).toBe(formatRecommendations(OK_RESPONSE.status === 'ok' ? OK_RESPONSE.recommendations : []));
    expect(getRecommendations).toHaveBeenCalledWith(sessions.get('u1'), 5);

    const session = sessions.get('u1');
    expect([...session.seedEntities]).toEqual(['M1']);
    expect([...session.recommendedEntities]).toEqual(['M2', 'M3']);
    expect(session.history).toHaveLength(1);
    expect(session.history[0]).toMatchObject({ user: 'Recommend something like Seed Movie', reply: result.reply });
  });

  it('promotes earlier recommendations on a follow-up', async () => {
    await handler.handleTurn('u1', { text: 'like M1', intent: { intent: 'recommendation', seedEntities: [id('M1')] } });
    getRecommendations.mockResolvedValueOnce({ status: 'empty', degradations: [] });

    const result = await handler.handleTurn('u1', {
      text: 'more like those',
      intent: { intent: 'recommendation', isFollowUp: true },
    });

    const session = sessions.get('u1');
    expect(result.reply).toBe(NOTHING_FOUND_REPLY);
    expect([...session.seedEntities]).toEqual(['M1', 'M2', 'M3']);
    expect(session.recommendedEntities.size).toBe(0);
  });

  it('asks for a movie when there is nothing to go on', async () => {
    getRecommendations.mockResolvedValueOnce({ status: 'no_input', degradations: [] });

    const result = await handler.handleTurn('u1', { text: 'recommend me something', intent: { intent: 'recommendation' } });

    expect(result.reply).toBe(NO_INPUT_REPLY);
  });

  it.each(['clear', 'Reset', '  start over  '])('resets the session on "%s"', async (command) => {
    await handler.handleTurn('u1', { text: 'like M1', intent: { intent: 'recommendation', seedEntities: [id('M1')] } });

    const result = await handler.handleTurn('u1', { text: command });

    expect(result).toEqual({ kind: 'reset', reply: RESET_REPLY });
    const session = sessions.get('u1');
    expect(session.seedEntities.size).toBe(0);
    expect(session.recommendedEntities.size).toBe(0);
    expect(session.history).toEqual([]);
  });

  it.each(['help', 'INFO'])('answers "%s" with the help text', async (command) => {
    const result = await handler.handleTurn('u1', { text: command });

    expect(result).toEqual({ kind: 'help', reply: HELP_REPLY });
    expect(getRecommendations).not.toHaveBeenCalled();
  });

  it('does not run the recommender for other intents', async () => {
    const result = await handler.handleTurn('u1', {
      text: 'who directed it?',
      intent: { intent: 'other', negations: { genre: id('G_horror') } },
    });

    expect(result).toEqual({ kind: 'unsupported', reply: UNSUPPORTED_REPLY });
    expect(getRecommendations).not.toHaveBeenCalled();
    expect(sessions.get('u1').negations.get('genre')).toBe('G_horror');
  });

  it('turns an unexpected recommender failure into an apology', async () => {
    getRecommendations.mockRejectedValueOnce(new Error('boom'));

    const result = await handler.handleTurn('u1', { text: 'like M1', intent: { intent: 'recommendation', seedEntities: [id('M1')] } });

    expect(result).toEqual({ kind: 'failed', reply: FAILURE_REPLY });
    expect(sessions.get('u1').recommendedEntities.size).toBe(0);
  });

  it('processes turns of one user one at a time', async () => {
    const order: string[] = [];
    getRecommendations.mockImplementation(async (session: SessionView): Promise<RecommendationResponse> => {
      order.push(`start ${session.seedEntities.size}`);
      await new Promise((resolve) => setTimeout(resolve, 5));
      order.push(`end ${session.seedEntities.size}`);
      return { status: 'empty', degradations: [] };
    });

    await Promise.all([
      handler.handleTurn('u1', { text: 'a', intent: { intent: 'recommendation', seedEntities: [id('M1')] } }),
      handler.handleTurn('u1', { text: 'b', intent: { intent: 'recommendation', seedEntities: [id('M2')] } }),
    ]);

    expect(order).toEqual(['start 1', 'end 1', 'start 2', 'end 2']);
  });
});
