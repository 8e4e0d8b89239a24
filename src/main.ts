import { loadConfig, type ConfigResult } from "./config/loader.js";
import { LocalExecutor, type Executor } from "./execution/executor.js";
import { checkPrivilege } from "./pipeline/privilege.js";
import { bootstrap } from "./bootstrap.js";
import { type BootstrapError, toBootstrapError } from "./shared/errors.js";
import { logger } from "./logger.js";

export interface MainOptions {
  readonly euid: number;
  readonly env?: Record<string, string | undefined>;
  /** Built from `output.stream_commands` when omitted. */
  readonly executor?: Executor;
}

export interface MainResult {
  readonly exitCode: 0 | 1;
  readonly error: BootstrapError | null;
}

export async function main(options: MainOptions): Promise<MainResult> {
  // ── Phase 1: Privilege gate ───────────────────────────────────
  const denied = checkPrivilege(options.euid);
  if (denied) {
    logger.error({ euid: options.euid }, denied.message);
    return { exitCode: 1, error: denied };
  }

  // ── Phase 2: Load config ──────────────────────────────────────
  let loaded: ConfigResult;
  try {
    loaded = loadConfig(undefined, options.env);
  } catch (err) {
    const error = toBootstrapError(err);
    logger.error({ code: error.code, ...error.context }, error.message);
    return { exitCode: 1, error };
  }
  const { config, configPath, fromFile } = loaded;
  logger.info({ configPath, fromFile, user: config.user.name }, "Configuration loaded");

  // ── Phase 3: Run the pipeline ─────────────────────────────────
  const executor = options.executor ?? new LocalExecutor({ streamOutput: config.output.stream_commands });
  const report = await bootstrap({ config, executor, euid: options.euid });
  return { exitCode: report.exitCode, error: report.error };
}
