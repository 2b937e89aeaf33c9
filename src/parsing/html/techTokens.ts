/**
 * Technology token scan over free text
 */

import type { TechToken } from "@/types";

interface TokenOccurrence {
  token: TechToken;
  index: number;
}

/**
 * Find configured technology tokens in a text.
 *
 * Tokens are ordered by first occurrence. At the same position the
 * longer token wins, then the earlier configured one. Each token is
 * reported once.
 *
 * @returns Token names in occurrence order
 *
 * @example
 * scanTechTokens("We use Django and Python, plus PostgreSQL", tokens)
 * // ["Django", "Python", "PostgreSQL"]
 */
export function scanTechTokens(
  text: string,
  tokens: readonly TechToken[],
): string[] {
  const occurrences: TokenOccurrence[] = [];
  for (const token of tokens) {
    const match = token.pattern.exec(text);
    if (match) {
      occurrences.push({ token, index: match.index });
    }
  }

  occurrences.sort(
    (a, b) =>
      a.index - b.index ||
      b.token.name.length - a.token.name.length ||
      a.token.order - b.token.order,
  );

  return occurrences.map((occurrence) => occurrence.token.name);
}

/**
 * Main technology: the earliest token in the description
 */
export function pickMainTech(techStack: readonly string[]): string | undefined {
  return techStack.length > 0 ? techStack[0] : undefined;
}
