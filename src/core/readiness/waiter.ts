export type Probe = () => Promise<boolean>;

export type Clock = {
  now: () => number;
};

export type Sleep = (ms: number) => Promise<void>;

export type WaitOptions = {
  intervalMs: number;
  timeoutMs: number;
  clock?: Clock;
  sleep?: Sleep;
};

export type WaitResult = {
  status: "ready" | "timed-out";
  attempts: number;
  elapsedMs: number;
};

type WaitState =
  | { kind: "polling"; attempts: number }
  | { kind: "ready"; attempts: number; elapsedMs: number }
  | { kind: "timed-out"; attempts: number; elapsedMs: number };

// performance.now() は単調増加するため、壁時計の変更に影響されない
export const monotonicClock: Clock = {
  now: () => performance.now(),
};

export const delay: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

const attemptProbe = async (probe: Probe): Promise<boolean> => {
  try {
    return await probe();
  } catch {
    // 接続前の失敗は「未準備」と同じ扱い
    return false;
  }
};

/**
 * probe が成功するまで intervalMs 間隔で繰り返し呼び出す。
 * timeoutMs を超えた場合はエラーではなく "timed-out" を返す。
 */
export const waitForReady = async (
  probe: Probe,
  options: WaitOptions
): Promise<WaitResult> => {
  const clock = options.clock ?? monotonicClock;
  const sleep = options.sleep ?? delay;
  const startedAt = clock.now();

  let state: WaitState = { kind: "polling", attempts: 0 };

  while (state.kind === "polling") {
    const attempts: number = state.attempts + 1;
    const ready = await attemptProbe(probe);
    const elapsedMs = clock.now() - startedAt;

    if (ready) {
      state = { kind: "ready", attempts, elapsedMs };
    } else if (elapsedMs > options.timeoutMs) {
      state = { kind: "timed-out", attempts, elapsedMs };
    } else {
      await sleep(options.intervalMs);
      state = { kind: "polling", attempts };
    }
  }

  return {
    status: state.kind,
    attempts: state.attempts,
    elapsedMs: state.elapsedMs,
  };
};
