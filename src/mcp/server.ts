/**
 * MCP server exposing the formatter to editor and agent clients.
 *
 * Exposed tools:
 *  - latex.format       format a text buffer and return the result
 *  - latex.format_file  format a file, optionally in place or to another path
 *  - latex.check        report which files would change
 *
 * Handlers are thin adapters over src/format and src/tools. File paths are
 * resolved against, and confined to, the configured workspace root.
 */
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { formatLatex, type FormatOptions } from "../format/formatLatex.js";
import { checkFiles, formatFile } from "../tools/format.js";
import { type Config } from "../config/schema.js";
import { withOverrides } from "../config/load.js";
import { ensureInsideWorkspace, resolveWorkspaceRoot } from "../utils/security.js";
import { errorMessage } from "../utils/errors.js";
import { createLogger, type Logger } from "../utils/log.js";
import { NAME, VERSION } from "../meta.js";

// ---------------------------------------------------------------------------
// Zod Schemas for tool inputs
// ---------------------------------------------------------------------------

// registerTool expects a raw Zod shape for inputSchema, not a ZodObject
const LayoutInput = {
  width: z.number().int().min(1).optional().describe("Column at which prose is wrapped (default from config, 80)"),
  maxBlankLines: z.number().int().min(1).optional().describe("Longest run of blank lines kept between paragraphs"),
} as const;

const FormatInput = {
  text: z.string().describe("LaTeX source to format"),
  ...LayoutInput,
} as const;

const FormatFileInput = {
  file: z.string().describe("Path to a .tex file (relative paths resolve against the workspace root)"),
  inPlace: z.boolean().optional().describe("Rewrite the file when formatting changes it"),
  output: z.string().optional().describe("Write the result to this path instead"),
  ...LayoutInput,
} as const;

const CheckInput = {
  files: z.array(z.string()).nonempty().describe("Files to check"),
  ...LayoutInput,
} as const;

function textResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }] };
}

function jsonResult(value: unknown): CallToolResult {
  return textResult(JSON.stringify(value, null, 2));
}

function errorResult(err: unknown): CallToolResult {
  return { content: [{ type: "text", text: `Error: ${errorMessage(err)}` }], isError: true };
}

export function createServer(config: Config, logger: Logger = createLogger("mcp", { debug: config.debug })): McpServer {
  const server = new McpServer({ name: NAME, version: VERSION });
  const ws = resolveWorkspaceRoot(config.workspaceRoot);

  const formatOptions = (args: { width?: number; maxBlankLines?: number }): FormatOptions => {
    const cfg = withOverrides(config, { width: args.width, maxBlankLines: args.maxBlankLines }, "tool arguments");
    return { width: cfg.width, maxBlankLines: cfg.maxBlankLines, logger };
  };

  server.registerTool(
    "latex.format",
    {
      title: "Format LaTeX text",
      description: "Reformat LaTeX source: one sentence per line, prose wrapped at the given width, comments and environments untouched",
      inputSchema: FormatInput,
    },
    async (args) => {
      try {
        return textResult(formatLatex(args.text, formatOptions(args)));
      } catch (err: unknown) {
        return errorResult(err);
      }
    },
  );

  server.registerTool(
    "latex.format_file",
    {
      title: "Format a LaTeX file",
      description: "Format a .tex file. Returns the formatted text unless inPlace or output is given",
      inputSchema: FormatFileInput,
    },
    async (args) => {
      try {
        const file = ensureInsideWorkspace(args.file, ws);
        const output = args.output ? ensureInsideWorkspace(args.output, ws) : undefined;
        const res = await formatFile({ file, output, inPlace: args.inPlace }, formatOptions(args));
        const writes = output !== undefined || args.inPlace === true;
        return jsonResult({
          file: res.file,
          changed: res.changed,
          written: res.written,
          formatted: writes ? undefined : res.formatted,
        });
      } catch (err: unknown) {
        return errorResult(err);
      }
    },
  );

  server.registerTool(
    "latex.check",
    {
      title: "Check LaTeX formatting",
      description: "Report, for each file, whether formatting would change it",
      inputSchema: CheckInput,
    },
    async (args) => {
      try {
        const files = args.files.map((f) => ensureInsideWorkspace(f, ws));
        const results = await checkFiles(files, formatOptions(args));
        return jsonResult({ formatted: results.every((r) => !r.changed && r.error === undefined), files: results });
      } catch (err: unknown) {
        return errorResult(err);
      }
    },
  );

  return server;
}
