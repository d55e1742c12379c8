// src/pipeline/external.ts
import { spawn } from "node:child_process";
import { log } from "../logger.js";
import { degraded, errorMessage, ok, type StageResult } from "./stage.js";

export type ExternalStepOptions = {
  /** working directory for the command */
  cwd: string;
  /** extra environment, e.g. a worker count the collaborator owns */
  env?: Record<string, string>;
};

/**
 * Run an external collaborator (model, scanner) as a shell command. An unset
 * command is skipped; a failure to start or a non-zero exit is reported as
 * UpstreamFailure and never thrown, so later stages run on whatever the
 * collaborator last produced.
 */
export async function runExternalStep(
  name: string,
  command: string | undefined,
  opts: ExternalStepOptions
): Promise<StageResult<null>> {
  if (!command) {
    return degraded(name, null, "MissingInput", "no command configured");
  }
  log.info(`[EXT] ${name} start`, { command });
  const started = Date.now();
  try {
    const code = await new Promise<number | null>((resolve, reject) => {
      const child = spawn(command, {
        cwd: opts.cwd,
        env: { ...process.env, ...opts.env },
        shell: true,
        stdio: "inherit",
      });
      child.on("error", reject);
      child.on("close", resolve);
    });
    log.info(`[EXT] ${name} end`, { code, tookMs: Date.now() - started });
    return code === 0
      ? ok(name, null)
      : degraded(name, null, "UpstreamFailure", `exit code ${code}`);
  } catch (err) {
    log.error(`[EXT] ${name} failed to start`, { err: errorMessage(err) });
    return degraded(name, null, "UpstreamFailure", errorMessage(err));
  }
}
