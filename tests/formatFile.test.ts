import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { checkFiles, formatFile, formatFilesInPlace, readSource } from "../src/tools/format.js";
import { FormatIoError } from "../src/utils/errors.js";

const UNFORMATTED = "Alpha beta\ngamma. Delta.\n";
const FORMATTED = "Alpha beta gamma.\nDelta.\n";

let dir: string;

function write(name: string, text: string): string {
  const p = path.join(dir, name);
  fs.writeFileSync(p, text, "utf8");
  return p;
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "fmtlatex-files-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("formatFile", () => {
  it("returns the formatted text without writing by default", async () => {
    const file = write("a.tex", UNFORMATTED);
    const res = await formatFile({ file });
    expect(res).toEqual({ file, changed: true, formatted: FORMATTED });
    expect(fs.readFileSync(file, "utf8")).toBe(UNFORMATTED);
  });

  it("rewrites a changed file in place", async () => {
    const file = write("a.tex", UNFORMATTED);
    const res = await formatFile({ file, inPlace: true });
    expect(res.written).toBe(file);
    expect(fs.readFileSync(file, "utf8")).toBe(FORMATTED);
  });

  it("leaves an already formatted file alone", async () => {
    const file = write("a.tex", FORMATTED);
    const res = await formatFile({ file, inPlace: true });
    expect(res.changed).toBe(false);
    expect(res.written).toBeUndefined();
  });

  it("writes to an output path, creating its directory", async () => {
    const file = write("a.tex", FORMATTED);
    const output = path.join(dir, "out", "b.tex");
    const res = await formatFile({ file, output });
    expect(res).toEqual({ file, changed: false, written: output, formatted: FORMATTED });
    expect(fs.readFileSync(output, "utf8")).toBe(FORMATTED);
  });

  it("applies format options", async () => {
    const file = write("a.tex", "one two three.\n");
    expect((await formatFile({ file }, { width: 8 })).formatted).toBe("one two\nthree.\n");
  });
});

describe("readSource", () => {
  it("reports a missing file as a read failure", async () => {
    const missing = path.join(dir, "missing.tex");
    const err = await readSource(missing).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FormatIoError);
    if (!(err instanceof FormatIoError)) return;
    expect(err.code).toBe("read-failed");
    expect(err.path).toBe(missing);
    expect(err.message).toBe(`Cannot read ${missing} (ENOENT)`);
  });
});

describe("checkFiles", () => {
  it("reports each file in input order without writing", async () => {
    const files = [write("a.tex", UNFORMATTED), write("b.tex", FORMATTED), write("c.tex", UNFORMATTED)];
    expect(await checkFiles(files)).toEqual([
      { file: files[0], changed: true },
      { file: files[1], changed: false },
      { file: files[2], changed: true },
    ]);
    expect(fs.readFileSync(files[0], "utf8")).toBe(UNFORMATTED);
  });

  it("reports an unreadable file and still checks the rest", async () => {
    const missing = path.join(dir, "missing.tex");
    const files = [missing, write("b.tex", UNFORMATTED)];
    expect(await checkFiles(files)).toEqual([
      { file: missing, changed: false, error: `Cannot read ${missing} (ENOENT)` },
      { file: files[1], changed: true },
    ]);
  });

  it("returns nothing for no files", async () => {
    expect(await checkFiles([])).toEqual([]);
  });
});

describe("formatFilesInPlace", () => {
  it("rewrites every changed file", async () => {
    const files = [write("a.tex", UNFORMATTED), write("b.tex", FORMATTED)];
    const results = await formatFilesInPlace(files);
    expect(results.map((r) => r.changed)).toEqual([true, false]);
    expect(files.map((f) => fs.readFileSync(f, "utf8"))).toEqual([FORMATTED, FORMATTED]);
  });

  it("rewrites the other files before reporting a failure", async () => {
    const missing = path.join(dir, "missing.tex");
    const ok = write("b.tex", UNFORMATTED);
    const err = await formatFilesInPlace([missing, ok]).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FormatIoError);
    expect(fs.readFileSync(ok, "utf8")).toBe(FORMATTED);
  });
});
