import { loadRawConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";

export type ValidateOpts = {
  configDir?: string;
  envName?: string;
};

export type ValidateResult = { ok: true } | { ok: false; errors: string[] };

/** Load the layered config and check it against the schema. */
export function validateAll(opts: ValidateOpts): ValidateResult {
  let raw: Record<string, unknown>;
  try {
    raw = loadRawConfig(opts.envName, opts.configDir);
  } catch (e) {
    return { ok: false, errors: [e instanceof Error ? e.message : String(e)] };
  }

  const result = validateConfig(raw);
  if (result.valid) return { ok: true };
  return { ok: false, errors: result.errors.split(", ") };
}
