// Config loader: reads /etc/vps-bootstrap/config.yaml (or $VPS_BOOTSTRAP_CONFIG),
// applies environment overrides, then validates against configSchema.
// A missing file means "all defaults"; unreadable YAML or schema violations are fatal.
import { readFileSync, existsSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { configSchema, type BootstrapConfig } from "./schema.js";
import { BootstrapError, BootstrapErrorCode, errorMessage } from "../shared/errors.js";
import { logger } from "../logger.js";

export const DEFAULT_CONFIG_PATH = "/etc/vps-bootstrap/config.yaml";

export interface ConfigResult {
  config: BootstrapConfig;
  configPath: string;
  fromFile: boolean;
}

type Env = Record<string, string | undefined>;

export function loadConfig(explicitPath?: string, env: Env = process.env): ConfigResult {
  const configPath = explicitPath ?? env.VPS_BOOTSTRAP_CONFIG ?? DEFAULT_CONFIG_PATH;
  const fromFile = existsSync(configPath);

  let raw: unknown = {};
  if (fromFile) {
    try {
      raw = parseYaml(readFileSync(configPath, "utf-8")) ?? {};
    } catch (err) {
      throw new BootstrapError(BootstrapErrorCode.CONFIG_INVALID, `Could not parse ${configPath}`, {
        configPath,
        cause: errorMessage(err),
      });
    }
  } else {
    logger.info({ configPath }, "No config file found, using defaults");
  }

  const config = parseConfig(applyEnvOverrides(raw, env), configPath);
  return { config, configPath, fromFile };
}

/** Validate an already-parsed document. Exposed for callers that build config in code. */
export function parseConfig(raw: unknown, source = "<inline>"): BootstrapConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    throw new BootstrapError(BootstrapErrorCode.CONFIG_INVALID, `Invalid configuration in ${source}: ${issues.join("; ")}`, {
      configPath: source,
      issues,
    });
  }
  return result.data;
}

/** Environment variables win over the file: VPS_BOOTSTRAP_USER replaces user.name. */
function applyEnvOverrides(raw: unknown, env: Env): unknown {
  const username = env.VPS_BOOTSTRAP_USER;
  if (!username) return raw;
  const doc = isRecord(raw) ? raw : {};
  const user = isRecord(doc.user) ? doc.user : {};
  return { ...doc, user: { ...user, name: username } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}
