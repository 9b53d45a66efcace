import type {
  PipelineResult,
  Stage,
  StageExecutor,
  StageResult,
} from "../../shared/types";
import { logger } from "../../infrastructure/logger";

/**
 * ステージを順番に実行する。
 * critical なステージが失敗した時点で中断し、以降のステージは実行しない。
 * ロールバックは行わない。
 */
export const runStages = async (
  stages: Stage[],
  execute: StageExecutor
): Promise<PipelineResult> => {
  const results: StageResult[] = [];

  for (const stage of stages) {
    logger.step(stage.label);

    const exitCode = await execute(stage);
    results.push({ name: stage.name, exitCode, critical: stage.critical });

    if (exitCode === 0) {
      logger.debug(`Stage ${stage.name} completed`);
      continue;
    }

    if (!stage.critical) {
      logger.warn(
        `${stage.label} failed with exit code ${exitCode}; continuing.`
      );
      continue;
    }

    logger.error(`${stage.label} failed with exit code ${exitCode}.`);
    return { ok: false, failedStage: stage.name, exitCode, results };
  }

  return { ok: true, results };
};
