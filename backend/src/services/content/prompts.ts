/**
 * Prompt builders
 *
 * One pure function per call site. They take everything they need as input
 * and never touch the network, so each prompt can be asserted on directly.
 */

import { SpeakerRole, type Utterance } from '../../types/debate.js';
import { gameConfig } from '../../config/game.js';

/**
 * Voice of the AI persona
 */
export interface PromptStyle {
  speechRegister: string;
  maxSentences: number;
}

export const DEFAULT_PROMPT_STYLE: PromptStyle = {
  speechRegister: gameConfig.speechRegister,
  maxSentences: gameConfig.maxReplySentences,
};

export interface Matchup {
  userSide: string;
  aiSide: string;
  domain?: string;
}

/**
 * Debate question for a matchup
 */
export function describeTopic(domain?: string): string {
  const trimmed = domain?.trim();
  return trimmed ? `Who is the greatest of all time in ${trimmed}?` : 'Who is better?';
}

/**
 * Render history lines as "<persona>: <text>"
 */
export function formatHistory(history: readonly Utterance[], matchup: Matchup): string {
  return history
    .map(entry => `${entry.speaker === SpeakerRole.USER ? matchup.userSide : matchup.aiSide}: ${entry.text}`)
    .join('\n');
}

function sentenceLimit(style: PromptStyle): string {
  return style.maxSentences === 1 ? '1 sentence' : `${style.maxSentences} sentences`;
}

export function buildOpeningPrompt(matchup: Matchup, style: PromptStyle = DEFAULT_PROMPT_STYLE): string {
  return [
    `You are ${matchup.aiSide} in a debate against ${matchup.userSide}.`,
    `The topic is: ${describeTopic(matchup.domain)}`,
    `Speak in ${style.speechRegister}.`,
    'Be funny, witty, and aggressive but playful.',
    `Keep it short (max ${sentenceLimit(style)}).`,
    'Start the debate now.',
  ].join('\n');
}

export interface ReplyPromptInput extends Matchup {
  /** Most recent history entries, oldest first, not including the new user line */
  recentHistory: readonly Utterance[];
  userText: string;
}

export function buildReplyPrompt(input: ReplyPromptInput, style: PromptStyle = DEFAULT_PROMPT_STYLE): string {
  return [
    `You are ${input.aiSide} debating against ${input.userSide}.`,
    `The topic is: ${describeTopic(input.domain)}`,
    'Current conversation history:',
    formatHistory(input.recentHistory, input),
    '',
    `${input.userSide} just said: "${input.userText}"`,
    '',
    `Reply in ${style.speechRegister}.`,
    'Be sharp, funny, and defend your side.',
    `Max ${sentenceLimit(style)}.`,
  ].join('\n');
}

export interface JudgePromptInput extends Matchup {
  history: readonly Utterance[];
}

export function buildJudgePrompt(input: JudgePromptInput): string {
  return [
    `Judge this debate between ${input.userSide} and ${input.aiSide}.`,
    `The topic is: ${describeTopic(input.domain)}`,
    'History:',
    formatHistory(input.history, input),
    '',
    'Who won based on intelligence, wit, and points?',
    `Reply with just the winner's name: ${input.userSide} or ${input.aiSide}.`,
  ].join('\n');
}

export interface ScoringPromptInput {
  userSide: string;
  aiSide: string;
  userText: string;
  aiText: string;
  /** Highest total either line can get */
  cap: number;
}

/**
 * Split a per-line cap into reasoning, evidence and delivery (40/30/30)
 */
export function scoringRubric(cap: number): { reasoning: number; evidence: number; delivery: number } {
  const share = Math.floor(cap * 0.3);
  return { reasoning: cap - 2 * share, evidence: share, delivery: share };
}

export function buildScoringPrompt(input: ScoringPromptInput): string {
  const rubric = scoringRubric(input.cap);
  return [
    'You are scoring one exchange in a playful debate.',
    `USER (${input.userSide}) said: "${input.userText}"`,
    `AI (${input.aiSide}) said: "${input.aiText}"`,
    '',
    `Rate each line on reasoning (0-${rubric.reasoning}), evidence (0-${rubric.evidence}) and ` +
      `delivery (0-${rubric.delivery}), for a total between 0 and ${input.cap}.`,
    'Answer with exactly two integers separated by a comma, USER first, then AI.',
    `Example: ${Math.floor(input.cap * 0.6)},${Math.floor(input.cap * 0.45)}`,
    'Do not write anything else.',
  ].join('\n');
}

export function buildPortraitPrompt(characterName: string, domain?: string): string {
  const context = domain?.trim() ? `, known for ${domain.trim()}` : '';
  return (
    `Create a professional portrait photo of ${characterName}${context}, photorealistic, high quality, ` +
    'studio lighting, neutral background, facing camera, serious expression, head and shoulders shot'
  );
}
