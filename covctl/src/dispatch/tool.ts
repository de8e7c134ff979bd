import fs from "node:fs";
import path from "node:path";
import { InvalidArgumentError } from "../errors/tool-errors.js";
import { loadAjv } from "../schema/ajv.js";
import type { KeyedMutex } from "./mutex.js";

export type JsonSchema = Record<string, unknown>;

export type ToolInputSchema = {
  type: "object";
  properties: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties: false;
};

export type ToolSpec<TArgs> = {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  /** Directory the call works in; calls on the same directory never overlap. */
  lockPath?: (args: TArgs) => string;
  handler: (args: TArgs) => Promise<unknown>;
};

/** A tool with its argument types erased behind validation. */
export type RegisteredTool = {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  invoke: (args: unknown, mutex: KeyedMutex) => Promise<unknown>;
};

const ajv = loadAjv();

/** Resolve symlinks where possible so aliases of one directory share a lock. */
export function lockKeyFor(dir: string): string {
  const resolved = path.resolve(dir);
  try {
    return fs.realpathSync(resolved);
  } catch {
    return resolved;
  }
}

/**
 * Compile a tool's input schema once; `invoke` validates before the handler
 * (and therefore any external process) runs.
 */
export function defineTool<TArgs>(spec: ToolSpec<TArgs>): RegisteredTool {
  const validate = ajv.compile<TArgs>(spec.inputSchema);

  return {
    name: spec.name,
    description: spec.description,
    inputSchema: spec.inputSchema,
    invoke: async (args, mutex) => {
      const input = args ?? {};
      if (!validate(input)) {
        const detail = ajv.errorsText(validate.errors, { dataVar: "arguments", separator: "; " });
        throw new InvalidArgumentError(`Invalid arguments for ${spec.name}: ${detail}`);
      }
      const { lockPath } = spec;
      if (!lockPath) return spec.handler(input);
      return mutex.run(lockKeyFor(lockPath(input)), () => spec.handler(input));
    },
  };
}
