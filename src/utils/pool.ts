import { log } from "../logger.js";

/* ---------- tiny concurrency pool (no deps) ---------- */
export async function runWithConcurrency<T>(
  items: readonly T[],
  worker: (item: T, idx: number) => Promise<void>,
  concurrency: number
): Promise<void> {
  if (items.length === 0) return;
  const limit = Math.max(1, Math.floor(concurrency));
  let active = 0;
  let cursor = 0;

  return new Promise<void>((resolve) => {
    const launch = () => {
      if (cursor >= items.length) {
        if (active === 0) resolve();
        return;
      }
      const i = cursor++;
      active++;
      Promise.resolve()
        .then(() => worker(items[i], i))
        .catch((err: unknown) => {
          log.error("[WORKER] unhandled error", { idx: i, err });
        })
        .finally(() => {
          active--;
          launch();
        });
      if (active < limit) launch();
    };
    launch();
  });
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}
