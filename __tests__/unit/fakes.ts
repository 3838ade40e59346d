import type { CompletionOptions, ContentGenerationService } from "../../src/aiClient";
import type { RNG } from "../../src/shuffle";

/** Fisher–Yates with j === i at every step: leaves option order untouched. */
export const identityRng: RNG = { next: () => 0.999 };

export function rawQuestion(n: number, overrides: Record<string, unknown> = {}) {
  return {
    question: `Scenario ${n}: a teammate misses a deadline. What do you do?`,
    focus_area: "Communication",
    options: {
      a: `Ignore it ${n}`,
      b: `Talk to them privately ${n}`,
      c: `Escalate immediately ${n}`,
      d: `Complain to others ${n}`,
    },
    correct: "b",
    explanation: "A private conversation addresses the issue directly.",
    ...overrides,
  };
}

export const fiveRawQuestions = () => [1, 2, 3, 4, 5].map((n) => rawQuestion(n));

export class ScriptedService implements ContentGenerationService {
  readonly name = "scripted";
  readonly prompts: string[] = [];
  readonly calls: CompletionOptions[] = [];

  constructor(private readonly reply: (prompt: string) => string | Promise<string>) {}

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    this.prompts.push(prompt);
    this.calls.push(options);
    return this.reply(prompt);
  }
}

export const failingService = (message = "service unavailable") =>
  new ScriptedService(() => {
    throw new Error(message);
  });

/** Never answers; rejects with the signal's reason once it aborts. */
export const hangingService: ContentGenerationService = {
  name: "hanging",
  complete: (_prompt, options) =>
    new Promise<string>((_resolve, reject) => {
      options?.signal?.addEventListener("abort", () => reject(options?.signal?.reason));
    }),
};
