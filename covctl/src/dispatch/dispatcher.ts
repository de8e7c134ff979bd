import { ToolError, UnknownToolError, toErrorPayload, type ToolErrorPayload } from "../errors/tool-errors.js";
import type { Logger } from "../log/logger.js";
import { KeyedMutex } from "./mutex.js";
import type { ToolRegistry } from "./registry.js";
import { suggest } from "./suggest.js";

export type ToolOutcome = { ok: true; result: unknown } | { ok: false; error: ToolErrorPayload };

/**
 * Routes named calls to registered tools. Every failure comes back as a
 * `{ kind, message }` payload; nothing is rethrown to the caller.
 */
export class Dispatcher {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly log: Logger,
    private readonly mutex: KeyedMutex = new KeyedMutex(),
  ) {}

  async dispatch(name: string, args: unknown): Promise<ToolOutcome> {
    const startedAt = Date.now();
    const log = this.log.child({ tool: name });

    try {
      const tool = this.registry.get(name);
      if (!tool) {
        throw new UnknownToolError(name, suggest(name, this.registry.names()));
      }

      log.debug("Tool call started");
      const result = await tool.invoke(args, this.mutex);
      log.info("Tool call succeeded", { durationMs: Date.now() - startedAt });
      return { ok: true, result };
    } catch (err) {
      const error = toErrorPayload(err);
      const context = { kind: error.kind, durationMs: Date.now() - startedAt };
      if (err instanceof ToolError) {
        log.warn(`Tool call failed: ${error.message}`, context);
      } else {
        log.error("Tool call crashed", err, context);
      }
      return { ok: false, error };
    }
  }
}
