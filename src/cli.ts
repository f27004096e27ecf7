/**
 * Command-line front end.
 *
 *   fmtlatex [input] [output]        format INPUT (default stdin) to OUTPUT (default stdout)
 *   fmtlatex -i a.tex b.tex          rewrite files in place
 *   fmtlatex --check a.tex b.tex     exit 1 if any file would change
 *
 * Exit codes: 0 ok, 1 unformatted input found by --check, 2 usage, config or I/O error.
 */
import yargs from "yargs";
import { formatLatex, isFormatted, type FormatOptions } from "./format/formatLatex.js";
import { reloadConfig, withOverrides, type LoadConfigOptions } from "./config/load.js";
import { checkFiles, formatFilesInPlace, readSource, readStream, writeTarget, type CheckResult } from "./tools/format.js";
import { FmtLatexError, UsageError } from "./utils/errors.js";
import { createLogger } from "./utils/log.js";
import { NAME, VERSION } from "./meta.js";

export const EXIT_OK = 0;
export const EXIT_UNFORMATTED = 1;
export const EXIT_ERROR = 2;

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliIo {
  stdin: AsyncIterable<string | Buffer>;
  stdout: OutputStream;
  stderr: OutputStream;
}

interface CliArgs {
  inputs: string[];
  width?: number;
  maxBlankLines?: number;
  inPlace: boolean;
  check: boolean;
  debug?: boolean;
}

type ParseOutcome =
  | { kind: "run"; args: CliArgs }
  | { kind: "exit"; code: number; text: string; toStderr: boolean };

const USAGE = `$0 [input] [output]

Format LaTeX source code: one sentence per line, prose wrapped at --width.

Read from INPUT and write to OUTPUT. If INPUT and/or OUTPUT are omitted or are
'-', read/write from/to stdin/stdout. With --in-place or --check every
argument is an input file.`;

function buildParser() {
  return yargs()
    .scriptName(NAME)
    .usage(USAGE)
    .option("width", { alias: "w", type: "number", description: "Column at which to wrap prose" })
    .option("max-blank-lines", { type: "number", description: "Longest run of blank lines kept between paragraphs" })
    .option("in-place", { alias: "i", type: "boolean", description: "Rewrite each input file in place" })
    .option("check", { type: "boolean", description: "List inputs that would change and exit 1 if there are any" })
    .option("debug", { type: "boolean", description: "Enable debug logging on stderr" })
    .help("help")
    .alias("help", "h")
    .version(VERSION)
    .strictOptions()
    .exitProcess(false);
}

function parseArgs(argv: readonly string[]): Promise<ParseOutcome> {
  return new Promise((resolve) => {
    buildParser().parse(argv, {}, (err, parsed, output) => {
      if (err) {
        resolve({ kind: "exit", code: EXIT_ERROR, text: output || err.message, toStderr: true });
        return;
      }
      // --help and --version produce output instead of arguments to act on
      if (output) {
        resolve({ kind: "exit", code: EXIT_OK, text: output, toStderr: false });
        return;
      }
      resolve({
        kind: "run",
        args: {
          inputs: parsed._.map(String),
          width: parsed.width,
          maxBlankLines: parsed["max-blank-lines"],
          inPlace: parsed["in-place"] ?? false,
          check: parsed.check ?? false,
          debug: parsed.debug,
        },
      });
    });
  });
}

async function runFormat(inputs: string[], fmt: FormatOptions, io: CliIo): Promise<number> {
  if (inputs.length > 2) {
    throw new UsageError(`expected at most two arguments (input and output), got ${inputs.length}`);
  }
  const [input = "-", output = "-"] = inputs;
  const source = input === "-" ? await readStream(io.stdin) : await readSource(input);
  const formatted = formatLatex(source, fmt);
  if (output === "-") {
    io.stdout.write(formatted);
  } else {
    await writeTarget(output, formatted);
  }
  return EXIT_OK;
}

async function runCheck(inputs: string[], fmt: FormatOptions, io: CliIo): Promise<number> {
  const files = inputs.length > 0 ? inputs : ["-"];
  const results: CheckResult[] = [];
  if (files.includes("-")) {
    const source = await readStream(io.stdin);
    results.push({ file: "<stdin>", changed: !isFormatted(source, fmt) });
  }
  results.push(...(await checkFiles(files.filter((f) => f !== "-"), fmt)));
  for (const r of results) {
    if (r.error !== undefined) io.stderr.write(`${NAME}: ${r.error}\n`);
    else if (r.changed) io.stderr.write(`would reformat ${r.file}\n`);
  }
  if (results.some((r) => r.error !== undefined)) return EXIT_ERROR;
  return results.some((r) => r.changed) ? EXIT_UNFORMATTED : EXIT_OK;
}

async function runInPlace(inputs: string[], fmt: FormatOptions): Promise<number> {
  if (inputs.length === 0 || inputs.includes("-")) {
    throw new UsageError("--in-place needs file arguments; stdin cannot be rewritten");
  }
  await formatFilesInPlace(inputs, fmt);
  return EXIT_OK;
}

export async function runCli(argv: readonly string[], io: CliIo, options: LoadConfigOptions = {}): Promise<number> {
  const outcome = await parseArgs(argv);
  if (outcome.kind === "exit") {
    const text = outcome.text.endsWith("\n") ? outcome.text : outcome.text + "\n";
    (outcome.toStderr ? io.stderr : io.stdout).write(text);
    return outcome.code;
  }
  const { args } = outcome;
  try {
    if (args.inPlace && args.check) throw new UsageError("--in-place and --check cannot be combined");
    const config = withOverrides(
      reloadConfig(options),
      { width: args.width, maxBlankLines: args.maxBlankLines, debug: args.debug },
      "command-line options",
    );
    const logger = createLogger("format", { debug: config.debug, sink: (line) => io.stderr.write(line + "\n") });
    logger.debug("Enabled debug output");
    const fmt: FormatOptions = { width: config.width, maxBlankLines: config.maxBlankLines, logger };
    if (args.check) return await runCheck(args.inputs, fmt, io);
    if (args.inPlace) return await runInPlace(args.inputs, fmt);
    return await runFormat(args.inputs, fmt, io);
  } catch (err) {
    if (err instanceof FmtLatexError) {
      io.stderr.write(`${NAME}: ${err.message}\n`);
      return EXIT_ERROR;
    }
    throw err;
  }
}
