/**
 * Side assignment and winner resolution
 */

export interface SideAssignment {
  userSide: string;
  aiSide: string;
}

export function samePersona(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * The user claims a side (userPersona unless userSide is given). If the claim
 * is the first persona the AI takes the second, otherwise the AI takes the first.
 */
export function resolveSides(input: {
  userPersona: string;
  aiPersona: string;
  userSide?: string;
}): SideAssignment {
  const first = input.userPersona.trim();
  const second = input.aiPersona.trim();
  const claimed = input.userSide?.trim() || first;

  return {
    userSide: claimed,
    aiSide: samePersona(claimed, first) ? second : first,
  };
}

function normalize(text: string): string {
  return text.toLowerCase().replace(/[^\p{L}\p{N}\s]/gu, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Persona named by a judge reply, if it names exactly one of the two
 */
export function findNamedPersona(reply: string, sides: SideAssignment): string | undefined {
  const answer = normalize(reply);
  const user = normalize(sides.userSide);
  const ai = normalize(sides.aiSide);

  if (!answer) {
    return undefined;
  }

  if (answer === user) return sides.userSide;
  if (answer === ai) return sides.aiSide;

  const mentionsUser = user !== '' && ` ${answer} `.includes(` ${user} `);
  const mentionsAi = ai !== '' && ` ${answer} `.includes(` ${ai} `);

  if (mentionsUser && !mentionsAi) return sides.userSide;
  if (mentionsAi && !mentionsUser) return sides.aiSide;
  return undefined;
}

/**
 * Named persona, else the score leader, else the draw label
 */
export function resolveWinner(
  reply: string | undefined,
  standing: SideAssignment & { userScore: number; aiScore: number },
  drawLabel: string
): string {
  const named = reply === undefined ? undefined : findNamedPersona(reply, standing);
  if (named) {
    return named;
  }

  if (standing.userScore > standing.aiScore) return standing.userSide;
  if (standing.aiScore > standing.userScore) return standing.aiSide;
  return drawLabel;
}
