/**
 * Sign matching primitives shared by the classifier and extractors
 */

import type { CompiledSign, SignSet } from "@/types";

/**
 * A sign occurrence in a text
 */
export interface SignMatch {
  sign: CompiledSign;
  /** Position of the match in the searched text */
  index: number;
  /** Matched text */
  text: string;
  /** First capture group, when the sign has one and it participated */
  group?: string;
}

function toSignMatch(sign: CompiledSign, match: RegExpExecArray): SignMatch {
  const group = match.length > 1 ? match[1] : undefined;
  return {
    sign,
    index: match.index,
    text: match[0],
    ...(group !== undefined ? { group } : {}),
  };
}

/**
 * True when any sign of the set occurs in the text
 */
export function matchesAnySign(text: string, signs: SignSet): boolean {
  return signs.some((sign) => sign.pattern.test(text));
}

/**
 * First sign (in configured order) that occurs in the text.
 * Sign order decides, not position.
 */
export function findFirstSign(
  text: string,
  signs: SignSet,
): SignMatch | undefined {
  for (const sign of signs) {
    const match = sign.pattern.exec(text);
    if (match) {
      return toSignMatch(sign, match);
    }
  }
  return undefined;
}

/**
 * Leftmost occurrence of any sign in the text.
 * Ties at the same position go to the earlier sign.
 */
export function findLeftmostSign(
  text: string,
  signs: SignSet,
): SignMatch | undefined {
  let best: SignMatch | undefined;
  for (const sign of signs) {
    const match = sign.pattern.exec(text);
    if (match && (best === undefined || match.index < best.index)) {
      best = toSignMatch(sign, match);
    }
  }
  return best;
}
