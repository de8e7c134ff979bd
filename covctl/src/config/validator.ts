import { loadAjv } from "../schema/ajv.js";
import type { CovctlConfig } from "../types/config.js";
import { loadRawConfig } from "./loader.js";

const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "build", "git", "pull_request", "logging"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    build: {
      type: "object",
      required: ["command", "args", "timeout_seconds", "max_output_bytes"],
      properties: {
        command: { type: "string", minLength: 1 },
        args: { type: "array", items: { type: "string" } },
        timeout_seconds: { type: "number", exclusiveMinimum: 0 },
        max_output_bytes: { type: "integer", minimum: 1024 },
      },
    },
    git: {
      type: "object",
      required: ["timeout_seconds", "add_exclude"],
      properties: {
        timeout_seconds: { type: "number", exclusiveMinimum: 0 },
        add_exclude: { type: "array", items: { type: "string", minLength: 1 } },
      },
    },
    pull_request: {
      type: "object",
      required: ["cli", "default_base", "default_title", "footer", "timeout_seconds"],
      properties: {
        cli: { type: "string", minLength: 1 },
        default_base: { type: "string", minLength: 1 },
        default_title: { type: "string", minLength: 1 },
        footer: { type: "string" },
        timeout_seconds: { type: "number", exclusiveMinimum: 0 },
      },
    },
    logging: {
      type: "object",
      required: ["level"],
      properties: {
        level: { type: "string", enum: ["debug", "info", "warn", "error"] },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: CovctlConfig; errors: null }
  | { valid: false; config: null; errors: string };

const ajv = loadAjv();
const validate = ajv.compile<CovctlConfig>(CONFIG_SCHEMA);

/** Validate a loaded config against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  if (validate(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, config: null, errors: ajv.errorsText(validate.errors) };
}

/** Load and validate in one step; throws with the schema violations on failure. */
export function loadConfig(envName?: string, configDir?: string, env?: NodeJS.ProcessEnv): CovctlConfig {
  const result = validateConfig(loadRawConfig(envName, configDir, env));
  if (!result.valid) {
    throw new Error(`Invalid configuration: ${result.errors}`);
  }
  return result.config;
}
