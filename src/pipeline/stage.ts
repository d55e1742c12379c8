// src/pipeline/stage.ts
import { log } from "../logger.js";

/** Why a stage could not run on complete inputs. None of these abort a run. */
export type DegradationKind =
  | "MissingInput"
  | "MalformedRow"
  | "SchemaAmbiguity"
  | "UpstreamFailure";

export type StageResult<T> =
  | { status: "ok"; stage: string; data: T; rows?: number }
  | {
      status: "degraded";
      stage: string;
      data: T;
      kind: DegradationKind;
      reason: string;
      rows?: number;
    }
  | { status: "failed"; stage: string; kind: DegradationKind; reason: string };

export type StageStatus = StageResult<unknown>["status"];

export const ok = <T>(stage: string, data: T, rows?: number): StageResult<T> => ({
  status: "ok",
  stage,
  data,
  rows,
});

export const degraded = <T>(
  stage: string,
  data: T,
  kind: DegradationKind,
  reason: string,
  rows?: number
): StageResult<T> => ({ status: "degraded", stage, data, kind, reason, rows });

export const failed = (
  stage: string,
  kind: DegradationKind,
  reason: string
): StageResult<never> => ({ status: "failed", stage, kind, reason });

/** Only raised when the emitter has no combined artifact to read. */
export class MissingArtifactError extends Error {
  constructor(readonly path: string) {
    super(`combined artifact not found: ${path}`);
    this.name = "MissingArtifactError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Collects per-stage outcomes so degradation stays visible. */
export class RunSummary {
  private readonly entries: StageResult<unknown>[] = [];

  record<T>(result: StageResult<T>): StageResult<T> {
    this.entries.push(result);
    const ctx =
      result.status === "ok"
        ? { rows: result.rows }
        : { kind: result.kind, reason: result.reason };
    if (result.status === "ok") log.info(`[STAGE] ${result.stage} ok`, ctx);
    else log.warn(`[STAGE] ${result.stage} ${result.status}`, ctx);
    return result;
  }

  get stages(): readonly StageResult<unknown>[] {
    return this.entries;
  }

  status(stage: string): StageStatus | undefined {
    return this.entries.find((e) => e.stage === stage)?.status;
  }

  /** One line per stage, e.g. `caps          degraded  SchemaAmbiguity: ...` */
  lines(): string[] {
    return this.entries.map((e) => {
      const head = `${e.stage.padEnd(14)}${e.status.padEnd(10)}`;
      if (e.status === "ok")
        return e.rows === undefined ? head.trimEnd() : `${head}rows=${e.rows}`;
      return `${head}${e.kind}: ${e.reason}`;
    });
  }
}
