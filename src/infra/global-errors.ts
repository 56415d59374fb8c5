import { logger } from "../logger.js";

function logErr(kind: string, err: unknown): void {
  if (err instanceof Error) {
    logger.error(`${kind}: ${err.message}`, { kind, stack: err.stack });
  } else {
    logger.error(`${kind}: ${String(err)}`, { kind, err });
  }
}

/**
 * Logs anything that escapes the shell and runs `onShutdown` once on
 * SIGINT/SIGTERM.
 */
export function installGlobalErrorHandlers(onShutdown: () => void): void {
  process.on("uncaughtException", (err: Error) => {
    logErr("uncaughtException", err);
    process.exitCode = 1;
  });

  process.on("unhandledRejection", (reason: unknown) => {
    logErr("unhandledRejection", reason);
  });

  process.on("warning", (w: Error) => {
    logger.warn(`Process warning: ${w.name}: ${w.message}`, { stack: w.stack });
  });

  let shuttingDown = false;
  (["SIGINT", "SIGTERM"] as const).forEach((sig) => {
    process.on(sig, () => {
      if (shuttingDown) return;
      shuttingDown = true;
      logger.info(`Signal received: ${sig}. Shutting down…`);
      onShutdown();
    });
  });
}
