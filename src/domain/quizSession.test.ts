import { describe, expect, it } from "vitest";
import { InvalidRequestCountError, QuizStateError } from "./errors.js";
import { DEFAULT_POLICY } from "./policy.js";
import { QuizSession } from "./quizSession.js";
import { seededRandom } from "./random.js";
import type { OptionLabel, Question } from "./types.js";
import { makePool, makeQuestion } from "../testing/fakes.js";

function sessionOf(labels: OptionLabel[]): QuizSession {
  const questions: Question[] = labels.map((label, i) =>
    makeQuestion("specific", i + 1, label)
  );
  return new QuizSession({ requested: questions.length, questions });
}

describe("QuizSession", () => {
  it("starts active at position 0", () => {
    const s = sessionOf(["a", "b", "c"]);

    expect(s.state).toEqual({ kind: "active", position: 0 });
    expect(s.current()?.id).toBe(1);
    expect(s.total).toBe(3);
  });

  it("grades without moving and ignores label case", () => {
    const s = sessionOf(["b", "c"]);

    expect(s.submit("B")).toBe(true);
    expect(s.correct).toBe(1);
    expect(s.state).toEqual({ kind: "active", position: 0 });
  });

  it("counts a position only once when submitted twice", () => {
    const s = sessionOf(["a", "b"]);

    expect(s.submit("a")).toBe(true);
    expect(s.submit("a")).toBe(true);
    expect(s.submit("c")).toBe(true);
    expect(s.correct).toBe(1);
    expect(s.progress().answered).toBe(1);
  });

  it("treats labels outside a-d as wrong", () => {
    const s = sessionOf(["a"]);
    expect(s.submit("e")).toBe(false);
    expect(s.correct).toBe(0);
  });

  it("finishes when advancing past the last question", () => {
    const s = sessionOf(["a", "b"]);

    expect(s.advance()).toEqual({ kind: "active", position: 1 });
    expect(s.current()?.id).toBe(2);
    expect(s.advance()).toEqual({ kind: "finished" });
    expect(s.current()).toBeUndefined();
    expect(s.isActive).toBe(false);
  });

  it("ignores submit and advance once finished", () => {
    const s = sessionOf(["a"]);
    s.submit("a");
    s.advance();
    const before = s.progress();

    expect(s.submit("a")).toBe(false);
    expect(s.advance()).toEqual({ kind: "finished" });
    expect(s.progress()).toEqual(before);
    expect(s.correct).toBe(1);
  });

  it("closes early and stays closed", () => {
    const s = sessionOf(["a", "b", "c"]);
    s.submit("a");
    s.close();
    s.close();

    expect(s.state).toEqual({ kind: "finished" });
    expect(s.progress()).toEqual({ position: 0, total: 3, correct: 1, answered: 1 });
    expect(s.finalize().percentage).toBeCloseTo(33.333, 3);
  });

  it("refuses to finalize while active", () => {
    const s = sessionOf(["a"]);
    expect(() => s.finalize()).toThrow(QuizStateError);
  });

  it("scores 7 of 10 as excellent", () => {
    const labels: OptionLabel[] = ["a", "b", "c", "d", "a", "b", "c", "d", "a", "b"];
    const s = sessionOf(labels);
    labels.forEach((label, i) => {
      s.submit(i < 7 ? label : "x");
      s.advance();
    });

    const result = s.finalize();
    expect(result.correct).toBe(7);
    expect(result.total).toBe(10);
    expect(result.percentage).toBe(70);
    expect(result.tier).toBe("excellent");
  });

  it("is finished from the start when nothing was selected", () => {
    const s = new QuizSession({ requested: 10, questions: [] });

    expect(s.state).toEqual({ kind: "finished" });
    expect(s.finalize()).toMatchObject({
      percentage: 0,
      tier: "needs_improvement",
      total: 0,
    });
  });

  it("gives each session its own id", () => {
    expect(sessionOf(["a"]).id).not.toBe(sessionOf(["a"]).id);
  });

  describe("prepare", () => {
    it("samples from both pools", () => {
      const s = QuizSession.prepare(
        10,
        { specific: makePool("specific", 20), general: makePool("general", 20) },
        DEFAULT_POLICY,
        seededRandom(4)
      );

      expect(s.requested).toBe(10);
      expect(s.total).toBe(10);
      expect(s.questions.filter((q) => q.pool === "specific")).toHaveLength(6);
    });

    it("rejects a non-positive count", () => {
      expect(() =>
        QuizSession.prepare(0, { specific: [], general: [] })
      ).toThrow(InvalidRequestCountError);
    });
  });
});
