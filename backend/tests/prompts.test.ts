import { describe, it, expect } from 'vitest';
import {
  buildOpeningPrompt,
  buildReplyPrompt,
  buildJudgePrompt,
  buildScoringPrompt,
  scoringRubric,
  buildPortraitPrompt,
  describeTopic,
  formatHistory,
  type PromptStyle,
} from '../src/services/content/prompts.js';
import { SpeakerRole, type Utterance } from '../src/types/debate.js';

const style: PromptStyle = { speechRegister: 'Nigerian Pidgin English', maxSentences: 2 };
const matchup = { userSide: 'Messi', aiSide: 'Ronaldo' };

const history: Utterance[] = [
  { speaker: SpeakerRole.AI, text: 'Na me be the GOAT.' },
  { speaker: SpeakerRole.USER, text: 'Eight Ballon d’Or no be joke.' },
];

describe('describeTopic', () => {
  it('should use the generic question without a domain', () => {
    expect(describeTopic()).toBe('Who is better?');
    expect(describeTopic('   ')).toBe('Who is better?');
  });

  it('should name the domain when given', () => {
    expect(describeTopic(' Football ')).toBe('Who is the greatest of all time in Football?');
  });
});

describe('formatHistory', () => {
  it('should label lines with persona names', () => {
    expect(formatHistory(history, matchup)).toBe(
      'Ronaldo: Na me be the GOAT.\nMessi: Eight Ballon d’Or no be joke.'
    );
  });
});

describe('buildOpeningPrompt', () => {
  it('should put the AI in character against the user', () => {
    expect(buildOpeningPrompt(matchup, style)).toBe(
      [
        'You are Ronaldo in a debate against Messi.',
        'The topic is: Who is better?',
        'Speak in Nigerian Pidgin English.',
        'Be funny, witty, and aggressive but playful.',
        'Keep it short (max 2 sentences).',
        'Start the debate now.',
      ].join('\n')
    );
  });

  it('should follow the configured register and sentence limit', () => {
    const prompt = buildOpeningPrompt(
      { ...matchup, domain: 'Football' },
      { speechRegister: 'British English', maxSentences: 1 }
    );

    expect(prompt).toContain('The topic is: Who is the greatest of all time in Football?');
    expect(prompt).toContain('Speak in British English.');
    expect(prompt).toContain('Keep it short (max 1 sentence).');
  });
});

describe('buildReplyPrompt', () => {
  it('should include the recent history and the new user line', () => {
    const prompt = buildReplyPrompt({ ...matchup, recentHistory: history, userText: 'You dey whine me' }, style);

    expect(prompt).toBe(
      [
        'You are Ronaldo debating against Messi.',
        'The topic is: Who is better?',
        'Current conversation history:',
        'Ronaldo: Na me be the GOAT.',
        'Messi: Eight Ballon d’Or no be joke.',
        '',
        'Messi just said: "You dey whine me"',
        '',
        'Reply in Nigerian Pidgin English.',
        'Be sharp, funny, and defend your side.',
        'Max 2 sentences.',
      ].join('\n')
    );
  });
});

describe('buildJudgePrompt', () => {
  it('should list the full history and both names', () => {
    const prompt = buildJudgePrompt({ ...matchup, history });

    expect(prompt.split('\n')[0]).toBe('Judge this debate between Messi and Ronaldo.');
    expect(prompt).toContain('Ronaldo: Na me be the GOAT.\nMessi: Eight Ballon d’Or no be joke.');
    expect(prompt.endsWith("Reply with just the winner's name: Messi or Ronaldo.")).toBe(true);
  });
});

describe('buildScoringPrompt', () => {
  it('should ask for two comma-separated integers', () => {
    const prompt = buildScoringPrompt({
      ...matchup,
      userText: 'Messi get more assists',
      aiText: 'Ronaldo get more goals',
      cap: 20,
    });

    expect(prompt).toContain('USER (Messi) said: "Messi get more assists"');
    expect(prompt).toContain('AI (Ronaldo) said: "Ronaldo get more goals"');
    expect(prompt).toContain(
      'Rate each line on reasoning (0-8), evidence (0-6) and delivery (0-6), for a total between 0 and 20.'
    );
    expect(prompt).toContain('Answer with exactly two integers separated by a comma, USER first, then AI.');
    expect(prompt).toContain('Example: 12,9');
  });

  it('should scale the rubric to the per-turn cap', () => {
    const prompt = buildScoringPrompt({ ...matchup, userText: 'Oya', aiText: 'Ehn', cap: 10 });

    expect(prompt).toContain(
      'Rate each line on reasoning (0-4), evidence (0-3) and delivery (0-3), for a total between 0 and 10.'
    );
    expect(prompt).toContain('Example: 6,4');
  });
});

describe('scoringRubric', () => {
  it('should always add up to the cap', () => {
    expect(scoringRubric(20)).toEqual({ reasoning: 8, evidence: 6, delivery: 6 });
    expect(scoringRubric(7)).toEqual({ reasoning: 3, evidence: 2, delivery: 2 });
    expect(scoringRubric(1)).toEqual({ reasoning: 1, evidence: 0, delivery: 0 });
  });
});

describe('buildPortraitPrompt', () => {
  it('should describe a head-and-shoulders portrait', () => {
    expect(buildPortraitPrompt('Messi')).toBe(
      'Create a professional portrait photo of Messi, photorealistic, high quality, ' +
        'studio lighting, neutral background, facing camera, serious expression, head and shoulders shot'
    );
  });

  it('should add the domain as context', () => {
    expect(buildPortraitPrompt('Messi', 'Football')).toMatch(
      /^Create a professional portrait photo of Messi, known for Football, photorealistic/
    );
  });
});
