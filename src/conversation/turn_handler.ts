/**
 * @fileoverview One conversational turn
 *
 * Runs under the user's session lock: commands first, then the parsed
 * intent is merged into the session and, for recommendation intents, the
 * pipeline runs and the results are remembered so they are not repeated.
 */

import type { ParsedIntent } from '../core/contracts.js';
import type { RecommendationResponse, Recommender } from '../pipeline/recommender.js';
import type { Session } from '../session/session.js';
import type { SessionManager } from '../session/session_manager.js';
import { createLogger } from '../telemetry/logger.js';
import {
  FAILURE_REPLY,
  HELP_COMMANDS,
  HELP_REPLY,
  NOTHING_FOUND_REPLY,
  NO_INPUT_REPLY,
  RESET_COMMANDS,
  RESET_REPLY,
  UNSUPPORTED_REPLY,
  formatRecommendations,
} from './replies.js';

const log = createLogger('turn-handler');

export interface TurnInput {
  /** Raw user message. */
  text: string;
  /** Parsed form of `text`; absent when the parser found nothing. */
  intent?: ParsedIntent;
}

export type TurnKind = 'reset' | 'help' | 'recommendation' | 'unsupported' | 'failed';

export interface TurnResult {
  kind: TurnKind;
  reply: string;
  response?: RecommendationResponse;
}

export type RecommendationSource = Pick<Recommender, 'getRecommendations'>;

export interface TurnHandlerOptions {
  topK?: number;
}

export class TurnHandler {
  constructor(
    private readonly sessions: SessionManager,
    private readonly recommender: RecommendationSource,
    private readonly options: TurnHandlerOptions = {}
  ) {}

  handleTurn(userId: string, input: TurnInput): Promise<TurnResult> {
    return this.sessions.withSession(userId, (session) => this.process(session, input));
  }

  private async process(session: Session, input: TurnInput): Promise<TurnResult> {
    const command = input.text.trim().toLowerCase();

    if (RESET_COMMANDS.has(command)) {
      session.clear();
      return { kind: 'reset', reply: RESET_REPLY };
    }

    if (HELP_COMMANDS.has(command)) {
      session.recordTurn(input.text, HELP_REPLY);
      return { kind: 'help', reply: HELP_REPLY };
    }

    const intent = input.intent;
    if (intent) {
      session.update(intent);
    }

    if (intent?.intent !== 'recommendation') {
      session.recordTurn(input.text, UNSUPPORTED_REPLY);
      return { kind: 'unsupported', reply: UNSUPPORTED_REPLY };
    }

    const result = await this.recommend(session);
    session.recordTurn(input.text, result.reply);
    return result;
  }

  private async recommend(session: Session): Promise<TurnResult> {
    let response: RecommendationResponse;
    try {
      response = await this.recommender.getRecommendations(session, this.options.topK);
    } catch (error) {
      log.error('Recommendation failed', {
        userId: session.userId,
        error: error instanceof Error ? error.message : String(error),
      });
      return { kind: 'failed', reply: FAILURE_REPLY };
    }

    switch (response.status) {
      case 'no_input':
        return { kind: 'recommendation', reply: NO_INPUT_REPLY, response };
      case 'empty':
        return { kind: 'recommendation', reply: NOTHING_FOUND_REPLY, response };
      case 'ok':
        session.addRecommendations(response.recommendations.map((recommendation) => recommendation.id));
        return { kind: 'recommendation', reply: formatRecommendations(response.recommendations), response };
    }
  }
}
