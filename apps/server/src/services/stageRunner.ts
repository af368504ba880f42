import type pino from "pino";
import type { PipelineStage, StageRunOptions, StageSummary } from "../types/pipeline.js";
import { normalizeStageError } from "./pipelineError.js";

export type ItemOutcome = "processed" | "cached" | "skipped";

export interface ItemResult {
  outcome: ItemOutcome;
  message: string;
}

export interface StageItem {
  imageId: string;
}

/**
 * Shared per-image loop: bounded concurrency, progress after every image,
 * cooperative cancellation between images and per-image failure isolation.
 */
export async function runStage<T extends StageItem>(
  stage: PipelineStage,
  items: T[],
  options: StageRunOptions,
  logger: pino.Logger,
  worker: (item: T) => Promise<ItemResult>
): Promise<StageSummary> {
  const summary: StageSummary = {
    stage,
    total: items.length,
    processed: 0,
    cached: 0,
    skipped: 0,
    failures: []
  };
  let current = 0;

  await runWithConcurrency(items, Math.max(1, options.concurrency ?? 1), async (item) => {
    if (options.signal?.aborted) return;

    let message: string;
    try {
      const result = await worker(item);
      summary[result.outcome] += 1;
      message = result.message;
    } catch (error) {
      const normalized = normalizeStageError(error);
      summary.failures.push({ imageId: item.imageId, code: normalized.code, message: normalized.message });
      const log = { stage, imageId: item.imageId, code: normalized.code, err: normalized.cause ?? normalized };
      if (normalized.code === "cache_io_failed") {
        logger.error(log, "Cache write failed; image left unchanged");
      } else {
        logger.warn(log, "Image failed this stage; it will be retried on the next run");
      }
      message = `${item.imageId}: ${normalized.code}`;
    }

    current += 1;
    options.observer?.onProgress(current, items.length, message);
  });

  if (options.signal?.aborted) {
    logger.info({ stage, completed: current, total: items.length }, "Stage stopped before all images were issued");
  }
  return summary;
}

export async function runWithConcurrency<T>(items: T[], concurrency: number, worker: (item: T, index: number) => Promise<void>) {
  let cursor = 0;
  const runners = Array.from({ length: Math.min(concurrency, items.length) }, async () => {
    while (true) {
      const index = cursor;
      cursor += 1;
      if (index >= items.length) break;
      await worker(items[index], index);
    }
  });
  await Promise.all(runners);
}
