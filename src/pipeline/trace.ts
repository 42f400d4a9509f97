import { generateRunId, type Logger } from "../logging/index.js";

/**
 * Describe a thrown value for a log entry. Never throws, whatever was thrown.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  try {
    return String(err);
  } catch {
    return "non-error value";
  }
}

export interface RunTrace {
  succeed(): void;
  fail(err: unknown): void;
}

/**
 * Open a trace for one pipeline run. Without a logger nothing is written.
 */
export function startRun(
  logger: Logger | undefined,
  pipeline: string,
  transformerCount: number
): RunTrace {
  const runId = generateRunId();
  const startedAt = Date.now();

  logger?.debug("Pipeline run started", {
    pipeline,
    runId,
    transformers: transformerCount,
  });

  return {
    succeed() {
      logger?.info("Pipeline run completed", {
        pipeline,
        runId,
        durationMs: Date.now() - startedAt,
      });
    },
    fail(err) {
      logger?.error("Pipeline run failed", {
        pipeline,
        runId,
        error: describeError(err),
      });
    },
  };
}
