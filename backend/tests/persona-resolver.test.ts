import { describe, it, expect } from 'vitest';
import { resolveSides, findNamedPersona, resolveWinner } from '../src/services/debate/persona-resolver.js';

describe('resolveSides', () => {
  it('should give the AI the second persona when the user claims the first', () => {
    expect(resolveSides({ userPersona: 'Messi', aiPersona: 'Ronaldo' })).toEqual({
      userSide: 'Messi',
      aiSide: 'Ronaldo',
    });
  });

  it('should flip when the user claims the second persona', () => {
    expect(resolveSides({ userPersona: 'Messi', aiPersona: 'Ronaldo', userSide: ' ronaldo ' })).toEqual({
      userSide: 'ronaldo',
      aiSide: 'Messi',
    });
  });

  it('should compare names case-insensitively', () => {
    expect(resolveSides({ userPersona: 'Messi', aiPersona: 'Ronaldo', userSide: 'MESSI' })).toEqual({
      userSide: 'MESSI',
      aiSide: 'Ronaldo',
    });
  });
});

describe('findNamedPersona', () => {
  const sides = { userSide: 'Messi', aiSide: 'Ronaldo' };

  it('should match an exact answer', () => {
    expect(findNamedPersona('Ronaldo!', sides)).toBe('Ronaldo');
    expect(findNamedPersona('messi', sides)).toBe('Messi');
  });

  it('should find a single name inside a sentence', () => {
    expect(findNamedPersona('The winner na Messi, no doubt', sides)).toBe('Messi');
  });

  it('should return undefined when both or neither are named', () => {
    expect(findNamedPersona('Messi and Ronaldo tie', sides)).toBeUndefined();
    expect(findNamedPersona('Pele', sides)).toBeUndefined();
    expect(findNamedPersona('', sides)).toBeUndefined();
  });

  it('should not match a name inside another word', () => {
    expect(findNamedPersona('Messiah', sides)).toBeUndefined();
  });
});

describe('resolveWinner', () => {
  const standing = { userSide: 'Messi', aiSide: 'Ronaldo', userScore: 10, aiScore: 4 };

  it('should prefer the persona the judge named', () => {
    expect(resolveWinner('Ronaldo', standing, 'Draw')).toBe('Ronaldo');
  });

  it('should fall back to the score leader', () => {
    expect(resolveWinner(undefined, standing, 'Draw')).toBe('Messi');
    expect(resolveWinner('Nobody', { ...standing, userScore: 1 }, 'Draw')).toBe('Ronaldo');
  });

  it('should call a draw on level scores', () => {
    expect(resolveWinner(undefined, { ...standing, aiScore: 10 }, 'Draw')).toBe('Draw');
  });
});
