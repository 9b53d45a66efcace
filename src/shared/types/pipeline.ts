export type Stage = {
  name: string;
  label: string;
  // 実行先のサービス名
  target: string;
  command: string[];
  critical: boolean;
  user?: string;
  workdir?: string;
};

export type StageResult = {
  name: string;
  exitCode: number;
  critical: boolean;
};

export type PipelineResult =
  | { ok: true; results: StageResult[] }
  | {
      ok: false;
      failedStage: string;
      exitCode: number;
      results: StageResult[];
    };

export type StageExecutor = (stage: Stage) => Promise<number>;
