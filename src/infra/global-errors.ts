import { logger } from "../logger.js";

function logErr(kind: string, err: unknown): void {
  if (err instanceof Error) {
    logger.error(`${kind}: ${err.message}`, { kind, err, stack: err.stack });
  } else {
    logger.error(`${kind}: ${String(err)}`, { kind, err });
  }
}

export function installGlobalErrorHandlers(
  onShutdown: () => Promise<void> = async () => undefined
): void {
  process.on("uncaughtException", (err: Error) => {
    logErr("uncaughtException", err);
  });

  process.on("unhandledRejection", (reason: unknown) => {
    logErr("unhandledRejection", reason);
  });

  process.on("warning", (w: Error) => {
    logger.warn(`Process warning: ${w.name}: ${w.message}`, { stack: w.stack });
  });

  (["SIGINT", "SIGTERM"] as const).forEach((sig) => {
    process.once(sig, () => {
      logger.info(`Signal received: ${sig}. Shutting down…`);
      onShutdown()
        .catch((err: unknown) => logErr("shutdown", err))
        .finally(() => setTimeout(() => process.exit(0), 150));
    });
  });
}
