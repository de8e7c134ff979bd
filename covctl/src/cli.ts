#!/usr/bin/env node

import { Command } from "commander";
import type { App } from "./app.js";
import { bootstrap } from "./commands/bootstrap.js";
import { callTool } from "./commands/call.js";
import { formatCoverageReport, readCoverage } from "./commands/coverage.js";
import { EXIT } from "./commands/exit-codes.js";
import { validateAll } from "./commands/validate.js";
import { toErrorPayload } from "./errors/tool-errors.js";
import { logger } from "./log/logger.js";
import { SERVER_VERSION, serveStdio } from "./server/mcp-server.js";

type Format = "human" | "jsonl";
type ConfigOpts = { config?: string; env?: string };

function bootstrapOrExit(opts: ConfigOpts): App {
  const res = bootstrap({ configDir: opts.config, envName: opts.env }, logger);
  if (!res.ok) {
    console.error(res.error);
    process.exit(EXIT.CONFIG_INVALID);
  }
  return res.app;
}

const program = new Command();

program
  .name("covctl")
  .description("Tool server for agents that raise a project's test coverage")
  .version(SERVER_VERSION);

program
  .command("serve")
  .description("Serve the tools over MCP on stdin/stdout")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay to load on top of base.yaml")
  .action(async (opts: ConfigOpts) => {
    const app = bootstrapOrExit(opts);
    await serveStdio(app, logger);
  });

program
  .command("tools")
  .description("List the available tools")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay to load on top of base.yaml")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action((opts: ConfigOpts & { format: Format }) => {
    const app = bootstrapOrExit(opts);
    for (const tool of app.registry.list()) {
      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify({ name: tool.name, description: tool.description, inputSchema: tool.inputSchema }) + "\n");
      } else {
        console.log(`${tool.name}  ${tool.description}`);
      }
    }
  });

program
  .command("call")
  .description("Invoke one tool and print its result")
  .argument("<tool>", "Tool name, e.g. read_coverage")
  .option("--args <json>", "Tool arguments as a JSON object")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay to load on top of base.yaml")
  .action(async (tool: string, opts: ConfigOpts & { args?: string }) => {
    const app = bootstrapOrExit(opts);
    const res = await callTool(app, { tool, args: opts.args });
    if (!res.ok) {
      console.error(res.error);
      process.exit(EXIT.INVALID_ARGS);
    }
    const { outcome } = res;
    process.stdout.write(JSON.stringify(outcome.ok ? outcome.result : outcome.error, null, 2) + "\n");
    if (!outcome.ok) process.exit(EXIT.TOOL_FAILED);
  });

program
  .command("coverage")
  .description("Print a JaCoCo XML report, worst-covered classes first")
  .argument("<xml>", "Path to jacoco.xml")
  .option("--limit <n>", "Only show the first n classes", (v: string) => Number.parseInt(v, 10))
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action((xml: string, opts: { limit?: number; format: Format }) => {
    try {
      const report = readCoverage(xml);
      if (opts.format === "jsonl") {
        for (const cls of report.classes) process.stdout.write(JSON.stringify(cls) + "\n");
        process.stdout.write(JSON.stringify({ summary: report.summary }) + "\n");
      } else {
        for (const line of formatCoverageReport(report, opts.limit)) console.log(line);
      }
    } catch (err) {
      const payload = toErrorPayload(err);
      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify({ level: "error", ...payload }) + "\n");
      } else {
        console.error(`${payload.kind}: ${payload.message}`);
      }
      process.exit(EXIT.TOOL_FAILED);
    }
  });

program
  .command("validate")
  .description("Validate the layered configuration")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay to load on top of base.yaml")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action((opts: ConfigOpts & { format: Format }) => {
    const res = validateAll({ configDir: opts.config, envName: opts.env });
    if (!res.ok) {
      for (const message of res.errors) {
        if (opts.format === "jsonl") {
          process.stdout.write(JSON.stringify({ level: "error", code: "CONFIG_INVALID", message }) + "\n");
        } else {
          console.error(message);
        }
      }
      process.exit(EXIT.CONFIG_INVALID);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
    } else {
      console.log("OK");
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.TOOL_FAILED);
});
