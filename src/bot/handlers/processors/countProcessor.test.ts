import { describe, expect, it } from "vitest";
import { StoreUnavailableError } from "../../../domain/errors.js";
import { DEFAULT_POLICY } from "../../../domain/policy.js";
import { seededRandom } from "../../../domain/random.js";
import { QuizServiceImpl } from "../../../services/quiz.service.js";
import { countKeyboard } from "../../keyboards.js";
import { CountProcessor } from "./countProcessor.js";
import {
  fakeRepo,
  makeCallback,
  makeMessage,
  makePool,
  makeServices,
} from "../../../testing/fakes.js";

describe("CountProcessor", () => {
  it("parses count callbacks", () => {
    const { services } = makeServices(new QuizServiceImpl(fakeRepo({})));
    const processor = new CountProcessor(services);

    expect(processor.parse("cnt:20")).toEqual({ total: 20 });
    expect(processor.parse("cnt:")).toBeNull();
    expect(processor.parse("retry:abc")).toBeNull();
  });

  it("starts a quiz and shows its first question", async () => {
    const quizService = new QuizServiceImpl(
      fakeRepo({
        specific: makePool("specific", 10),
        general: makePool("general", 10),
      }),
      DEFAULT_POLICY,
      seededRandom(6)
    );
    const { services, botService } = makeServices(quizService);

    await new CountProcessor(services).process(
      makeMessage(),
      makeCallback("cnt:10"),
      { total: 10 }
    );

    const session = quizService.activeSession();
    expect(session?.total).toBe(10);
    expect(botService.sendMessage).toHaveBeenCalledTimes(1);
    expect(botService.sendMessage.mock.calls[0][2]).toMatchObject({
      parse_mode: "MarkdownV2",
      reply_markup: {
        inline_keyboard: [
          [{ text: "A", callback_data: `ans:${session?.id}:0:a` }, {}, {}, {}],
        ],
      },
    });
  });

  it("reports store failures and returns to the entry screen when nothing is left", async () => {
    const quizService = new QuizServiceImpl(
      fakeRepo({
        specific: new StoreUnavailableError("specific", new Error("locked")),
      })
    );
    const { services, botService } = makeServices(quizService);

    await new CountProcessor(services).process(
      makeMessage(),
      makeCallback("cnt:10"),
      { total: 10 }
    );

    expect(botService.sendMessage.mock.calls).toEqual([
      [
        7,
        "⚠️ The specific question store could not be read, so this quiz has no specific questions.",
      ],
      [
        7,
        "No questions are available right now.\n\nChoose how many questions you want:",
        { reply_markup: countKeyboard(DEFAULT_POLICY.countChoices, 40) },
      ],
    ]);
  });
});
