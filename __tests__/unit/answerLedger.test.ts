import { describe, it, expect } from "vitest";
import { AnswerKey, AnswerLedger } from "../../src/answerLedger";
import { FlowError } from "../../src/errors";

describe("AnswerLedger", () => {
  it("returns an empty list for a category with no answers", () => {
    expect(new AnswerLedger().get("Soft Skills")).toEqual([]);
  });

  it("appends answers in question order per category", () => {
    const ledger = new AnswerLedger();
    ledger.record("Soft Skills", 0, "a");
    ledger.record("AI Literacy", 0, "d");
    ledger.record("Soft Skills", 1, "c");

    expect(ledger.get("Soft Skills")).toEqual(["a", "c"]);
    expect(ledger.get("AI Literacy")).toEqual(["d"]);
    expect(ledger.categories()).toEqual(["Soft Skills", "AI Literacy"]);
    expect(ledger.totalAnswered).toBe(3);
  });

  it("refuses out-of-order or repeated indices", () => {
    const ledger = new AnswerLedger();
    ledger.record("Soft Skills", 0, "a");
    expect(() => ledger.record("Soft Skills", 0, "b")).toThrow(FlowError);
    expect(() => ledger.record("Soft Skills", 2, "b")).toThrow(
      "Answer for Soft Skills question 3 is out of order; expected question 2."
    );
    expect(ledger.get("Soft Skills")).toEqual(["a"]);
  });

  it("hands out copies that cannot edit the record", () => {
    const ledger = new AnswerLedger();
    ledger.record("Soft Skills", 0, "a");
    const copy = [...ledger.get("Soft Skills")];
    copy.push("z");
    expect(ledger.get("Soft Skills")).toEqual(["a"]);
  });
});

describe("AnswerKey", () => {
  it("stores labels by category and index", () => {
    const key = new AnswerKey();
    key.set("Soft Skills", 1, "c");
    key.set("Soft Skills", 0, "a");

    expect(key.get("Soft Skills", 0)).toBe("a");
    expect(key.get("Soft Skills", 4)).toBeUndefined();
    expect(key.get("AI Literacy", 0)).toBeUndefined();
    expect(key.entries("Soft Skills")).toEqual([
      [0, "a"],
      [1, "c"],
    ]);
  });

  it("clears one category without touching others", () => {
    const key = new AnswerKey();
    key.set("Soft Skills", 0, "a");
    key.set("AI Literacy", 0, "b");
    key.clear("Soft Skills");

    expect(key.has("Soft Skills")).toBe(false);
    expect(key.get("AI Literacy", 0)).toBe("b");
  });

  it("is isolated between instances", () => {
    const first = new AnswerKey();
    const second = new AnswerKey();
    first.set("Soft Skills", 0, "a");
    expect(second.get("Soft Skills", 0)).toBeUndefined();
  });
});
