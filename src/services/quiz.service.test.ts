import { describe, expect, it } from "vitest";
import { InvalidRequestCountError, StoreUnavailableError } from "../domain/errors.js";
import { seededRandom } from "../domain/random.js";
import { QuizServiceImpl } from "./quiz.service.js";
import { fakeRepo, makePool } from "../testing/fakes.js";

describe("QuizServiceImpl", () => {
  it("rejects an invalid count without reading the stores", async () => {
    const repo = fakeRepo({});
    const service = new QuizServiceImpl(repo);

    await expect(service.startQuiz(0)).rejects.toBeInstanceOf(
      InvalidRequestCountError
    );
    expect(repo.load).not.toHaveBeenCalled();
    expect(service.activeSession()).toBeUndefined();
  });

  it("starts a blended quiz and keeps it as the active session", async () => {
    const repo = fakeRepo({
      specific: makePool("specific", 3),
      general: makePool("general", 100),
    });
    const service = new QuizServiceImpl(repo, undefined, seededRandom(1));

    const { session, notices } = await service.startQuiz(10);

    expect(session.total).toBe(7);
    expect(notices).toEqual([]);
    expect(service.activeSession()).toBe(session);
    expect(service.getSession(session.id)).toBe(session);
  });

  it("reports unreadable stores and carries on with the other pool", async () => {
    const repo = fakeRepo({
      specific: new StoreUnavailableError("specific", new Error("locked")),
      general: makePool("general", 10),
    });
    const service = new QuizServiceImpl(repo, undefined, seededRandom(2));

    const { session, notices } = await service.startQuiz(10);

    expect(notices.map((n) => n.pool)).toEqual(["specific"]);
    expect(session.total).toBe(4);
    expect(session.questions.every((q) => q.pool === "general")).toBe(true);
  });

  it("closes the previous session when a new one starts", async () => {
    const repo = fakeRepo({
      specific: makePool("specific", 10),
      general: makePool("general", 10),
    });
    const service = new QuizServiceImpl(repo, undefined, seededRandom(3));

    const first = (await service.startQuiz(10)).session;
    const second = (await service.startQuiz(10)).session;

    expect(first.isActive).toBe(false);
    expect(service.getSession(first.id)).toBeUndefined();
    expect(service.activeSession()).toBe(second);
  });

  it("closeActive finishes the running session once", async () => {
    const repo = fakeRepo({ general: makePool("general", 5) });
    const service = new QuizServiceImpl(repo, undefined, seededRandom(4));
    const { session } = await service.startQuiz(5);

    expect(service.closeActive()).toBe(session);
    expect(service.closeActive()).toBeUndefined();
    expect(session.state).toEqual({ kind: "finished" });
    // still addressable for its result buttons
    expect(service.getSession(session.id)).toBe(session);
  });
});
