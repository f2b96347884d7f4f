/**
 * @fileoverview User-facing reply text
 */

import type { Recommendation } from '../pipeline/recommender.js';

export const RECOMMENDATION_HEADER = 'Here are a few recommendations:';
export const NO_INPUT_REPLY = 'I can give you recommendations if you tell me a movie you like!';
export const NOTHING_FOUND_REPLY =
  "I searched based on your preferences but couldn't find any matching movies. You could try broadening your search.";
export const RESET_REPLY = "Okay, let's start fresh. What can I help you with?";
export const UNSUPPORTED_REPLY =
  "I can only help with movie recommendations. Tell me a movie you like, or a genre you're in the mood for.";
export const FAILURE_REPLY = "I'm sorry, I had trouble finding recommendations. Please try again.";

export const HELP_REPLY = [
  'I can give you movie recommendations.',
  "Tell me a movie you like (e.g. 'Recommend a movie like The Lion King'),",
  "or what you're in the mood for (e.g. 'a comedy from the 90s').",
  "You can type 'clear' to reset our conversation.",
].join('\n');

export const RESET_COMMANDS: ReadonlySet<string> = new Set(['clear', 'reset', 'start over']);
export const HELP_COMMANDS: ReadonlySet<string> = new Set(['help', 'info']);

export function formatRecommendations(recommendations: readonly Recommendation[]): string {
  const lines = recommendations.map((recommendation) => `- **${recommendation.label}**: ${recommendation.reason}`);
  return [RECOMMENDATION_HEADER, ...lines].join('\n');
}
