import { describe, it, expect } from "vitest";
import { clamp01, fillImportance, labelFromScore, parseImportance } from "../../../src/services/importance";
import { InMemoryRecordStore, makeRecord } from "../../helpers/memory-store";

describe("importance parsing", () => {
  it("accepts numbers and clamps them", () => {
    expect(parseImportance(0.4)).toBe(0.4);
    expect(parseImportance(3)).toBe(1);
    expect(parseImportance(-2)).toBe(0);
    expect(parseImportance(Number.NaN)).toBeNull();
  });

  it("accepts score objects and labels with aliases", () => {
    expect(parseImportance({ score: 0.65 })).toBe(0.65);
    expect(parseImportance({ label: "must_remember" })).toBe(0.8);
    expect(parseImportance({ label: "Nice to have" })).toBe(0.5);
    expect(parseImportance({ label: "high" })).toBe(0.8);
    expect(parseImportance({ label: "low" })).toBe(0);
  });

  it("returns null for anything else", () => {
    expect(parseImportance("0.5")).toBeNull();
    expect(parseImportance({ label: "urgent" })).toBeNull();
    expect(parseImportance([0.5])).toBeNull();
    expect(parseImportance(null)).toBeNull();
  });

  it("labels scores by band", () => {
    expect(labelFromScore(0.9)).toBe("must_remember");
    expect(labelFromScore(0.8)).toBe("must_remember");
    expect(labelFromScore(0.5)).toBe("nice_to_have");
    expect(labelFromScore(0.49)).toBe("ignore");
    expect(labelFromScore(null)).toBe("unknown");
  });

  it("clamp01 maps non-finite values to 0", () => {
    expect(clamp01(Number.POSITIVE_INFINITY)).toBe(0);
    expect(clamp01(0.25)).toBe(0.25);
  });
});

describe("fillImportance", () => {
  it("writes only when the record has no importance", async () => {
    const store = new InMemoryRecordStore([
      makeRecord({ id: "a", importance: null }),
      makeRecord({ id: "b", importance: 0.2 })
    ]);

    expect(await fillImportance(store, "a", 0.9)).toEqual({ recordRef: "a", applied: true, importance: 0.9 });
    expect(await fillImportance(store, "b", 0.9)).toEqual({ recordRef: "b", applied: false, importance: 0.9 });
    expect(await fillImportance(store, "a", 0.1)).toEqual({ recordRef: "a", applied: false, importance: 0.1 });

    expect((await store.getRecord("a"))?.importance).toBe(0.9);
    expect((await store.getRecord("b"))?.importance).toBe(0.2);
  });

  it("clamps the written value", async () => {
    const store = new InMemoryRecordStore([makeRecord({ id: "a" })]);
    expect((await fillImportance(store, "a", 7)).importance).toBe(1);
  });
});
