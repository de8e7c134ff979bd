import type { App } from "../app.js";
import type { ToolOutcome } from "../dispatch/dispatcher.js";

export type CallOpts = {
  tool: string;
  /** JSON object text, as typed on the command line. */
  args?: string;
};

export type CallResult = { ok: true; outcome: ToolOutcome } | { ok: false; error: string };

/** One-shot dispatch outside the MCP server. */
export async function callTool(app: App, opts: CallOpts): Promise<CallResult> {
  let args: unknown = {};
  if (opts.args !== undefined) {
    try {
      args = JSON.parse(opts.args);
    } catch (e) {
      return { ok: false, error: `--args is not valid JSON: ${e instanceof Error ? e.message : String(e)}` };
    }
  }
  return { ok: true, outcome: await app.dispatcher.dispatch(opts.tool, args) };
}
