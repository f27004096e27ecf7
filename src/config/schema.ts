import { z } from "zod";

export const ConfigSchema = z
  .object({
    // Root of the workspace; MCP file paths must reside under this directory when set
    workspaceRoot: z.string().min(1).optional(),
    // Column at which prose is wrapped
    width: z.number().int().min(1).default(80),
    // Longest run of blank lines kept between paragraphs
    maxBlankLines: z.number().int().min(1).default(1),
    // Trace line classification on stderr
    debug: z.boolean().default(false),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

// Values accepted from the project file, the environment and command-line flags
export type ConfigInput = z.input<typeof ConfigSchema>;

export const defaultConfig: Config = ConfigSchema.parse({});
