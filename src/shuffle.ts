import type { OptionMap, Question } from "./assessmentTypes";

export type RNG = { next: () => number };

export const mathRandom: RNG = { next: () => Math.random() };

export function hashStringToSeed(s: string): number {
  let h = 2166136261;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

/** Small seeded PRNG; reproducible shuffles for tests and replays. */
export function mulberry32(seed: number): RNG {
  let t = seed >>> 0;
  return {
    next: () => {
      t += 0x6d2b79f5;
      let x = t;
      x = Math.imul(x ^ (x >>> 15), x | 1);
      x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
      return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
    },
  };
}

export function shuffle<T>(rng: RNG, arr: readonly T[]): T[] {
  const a = [...arr];
  for (let i = a.length - 1; i > 0; i--) {
    const j = Math.floor(rng.next() * (i + 1));
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}

const ALPHA = "abcdefghijklmnopqrstuvwxyz";

export function makeOptionLabels(n: number): string[] {
  if (n > ALPHA.length) throw new RangeError(`Cannot label ${n} options; at most ${ALPHA.length} are supported.`);
  return Array.from({ length: n }, (_, i) => ALPHA[i]);
}

/**
 * Reassigns option labels under a random permutation and remaps `correct`
 * to the label that now holds the originally-correct option.
 * The input is not modified.
 */
export function shuffleOptions(question: Question, rng: RNG = mathRandom): Question {
  if (!Object.hasOwn(question.options, question.correct)) {
    throw new Error(`Correct label "${question.correct}" is not one of the options.`);
  }

  const entries = shuffle(rng, Object.entries(question.options));
  const labels = makeOptionLabels(entries.length);

  const options: OptionMap = {};
  let correct = labels[0];
  entries.forEach(([originalLabel, text], i) => {
    options[labels[i]] = text;
    if (originalLabel === question.correct) correct = labels[i];
  });

  return { ...question, options, correct };
}
