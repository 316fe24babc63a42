import type { Services } from "../services/services.js";
import { AnswerProcessor } from "./handlers/processors/answerProcessor.js";
import type { BaseCallbackProcessor } from "./handlers/processors/baseCallbackProcessor.js";
import { CountProcessor } from "./handlers/processors/countProcessor.js";
import {
  ExitProcessor,
  RetryProcessor,
} from "./handlers/processors/resultProcessors.js";

export function createCallbackProcessors(
  services: Services
): Array<BaseCallbackProcessor<unknown>> {
  return [
    new CountProcessor(services),
    new AnswerProcessor(services),
    new RetryProcessor(services),
    new ExitProcessor(services),
  ];
}
