import { FlowError } from "./errors";

/**
 * Ground-truth correct labels, keyed by (category, question index).
 * One instance per assessment session.
 */
export class AnswerKey {
  private readonly byCategory = new Map<string, Map<number, string>>();

  set(category: string, index: number, label: string) {
    let entries = this.byCategory.get(category);
    if (!entries) {
      entries = new Map();
      this.byCategory.set(category, entries);
    }
    entries.set(index, label);
  }

  get(category: string, index: number): string | undefined {
    return this.byCategory.get(category)?.get(index);
  }

  /** Drops a category's entries before it is regenerated. */
  clear(category: string) {
    this.byCategory.delete(category);
  }

  has(category: string): boolean {
    return this.byCategory.has(category);
  }

  entries(category: string): [number, string][] {
    return [...(this.byCategory.get(category) ?? new Map<number, string>())].sort((a, b) => a[0] - b[0]);
  }
}

/** Append-only per-category record of selected option labels, in question order. */
export class AnswerLedger {
  private readonly answers = new Map<string, string[]>();

  record(category: string, index: number, label: string) {
    const list = this.answers.get(category) ?? [];
    if (index !== list.length) {
      throw new FlowError(
        `Answer for ${category} question ${index + 1} is out of order; expected question ${list.length + 1}.`
      );
    }
    list.push(label);
    this.answers.set(category, list);
  }

  get(category: string): readonly string[] {
    return [...(this.answers.get(category) ?? [])];
  }

  /** Categories with at least one answer, in the order they were first answered. */
  categories(): string[] {
    return [...this.answers.keys()];
  }

  get totalAnswered(): number {
    let n = 0;
    for (const list of this.answers.values()) n += list.length;
    return n;
  }
}
