import { createApp, type App } from "../app.js";
import { loadConfig } from "../config/validator.js";
import { errorMessage } from "../errors/tool-errors.js";
import type { Logger } from "../log/logger.js";

export type BootstrapOpts = {
  configDir?: string;
  envName?: string;
  env?: NodeJS.ProcessEnv;
};

export type BootstrapResult = { ok: true; app: App } | { ok: false; error: string };

/** Load the layered config, apply its log level and wire the tools. */
export function bootstrap(opts: BootstrapOpts, log: Logger): BootstrapResult {
  let config;
  try {
    config = loadConfig(opts.envName, opts.configDir, opts.env);
  } catch (e) {
    return { ok: false, error: errorMessage(e) };
  }
  log.setLevel(config.logging.level);
  return { ok: true, app: createApp({ config, log }) };
}
