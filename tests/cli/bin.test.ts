import { readFileSync } from "node:fs";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  jest,
} from "@jest/globals";

import { runCli } from "../../src/bin.js";

describe("runewrap CLI", () => {
  let directory: string;
  let stdout: string[];
  let stderr: string[];
  let stdoutSpy: jest.SpiedFunction<typeof process.stdout.write> | undefined;
  let stderrSpy: jest.SpiedFunction<typeof process.stderr.write> | undefined;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "runewrap-cli-"));
    stdout = [];
    stderr = [];

    stdoutSpy = jest
      .spyOn(process.stdout, "write")
      .mockImplementation((chunk: unknown) => {
        stdout.push(String(chunk));
        return true;
      });

    stderrSpy = jest
      .spyOn(process.stderr, "write")
      .mockImplementation((chunk: unknown) => {
        stderr.push(String(chunk));
        return true;
      });
  });

  afterEach(async () => {
    stdoutSpy?.mockRestore();
    stderrSpy?.mockRestore();
    await rm(directory, { recursive: true, force: true });
  });

  it("wraps files given as arguments", async () => {
    const path = join(directory, "input.txt");
    await writeFile(path, "one two three four");

    await runCli(["node", "runewrap", "--width", "9", "--indent", "..", path]);

    expect(stdout.join("")).toBe("one two\n..three\n..four\n");
    expect(stderr.join("")).toHaveLength(0);
  });

  it("accepts the explicit wrap command and separator escapes", async () => {
    const path = join(directory, "input.txt");
    await writeFile(path, "one two three");

    await runCli([
      "node",
      "runewrap",
      "wrap",
      "-w",
      "8",
      "--line-separator",
      "\\r\\n",
      path,
    ]);

    expect(stdout.join("")).toBe("one two\r\nthree\r\n");
  });

  it("keeps input line breaks with --no-fold-line-breaks", async () => {
    const path = join(directory, "input.txt");
    await writeFile(path, "first\nsecond\n\nthird\n");

    await runCli(["node", "runewrap", "--no-fold-line-breaks", path]);

    expect(stdout.join("")).toBe("first\nsecond\n\nthird\n");
  });

  it("reads .runewrap.yaml through --config", async () => {
    const settingsPath = join(directory, "settings.yaml");
    const path = join(directory, "input.txt");
    await writeFile(settingsPath, 'width: 10\nindent: "> "\n');
    await writeFile(path, "alpha beta gamma delta");

    await runCli(["node", "runewrap", "--config", settingsPath, path]);

    expect(stdout.join("")).toBe("alpha beta\n> gamma\n> delta\n");
  });

  it("rejects a non-numeric width", async () => {
    const path = join(directory, "input.txt");
    await writeFile(path, "text");

    await runCli(["node", "runewrap", "--width", "abc", path]);

    expect(stdout.join("")).toContain(
      "Expected positive integer after --width",
    );
    expect(process.exitCode).toBe(1);
  });

  it("rejects an indent as wide as the column", async () => {
    const path = join(directory, "input.txt");
    await writeFile(path, "text");

    await runCli(["node", "runewrap", "-w", "2", "--indent", "ab", path]);

    const output = stdout.join("");
    expect(output).toContain(
      "Column width 2 must be larger than subsequentRowIndent (2 columns).",
    );
    expect(output).toContain(
      "Increase the column width or shorten the indent and rerun.",
    );
    expect(process.exitCode).toBe(1);
  });

  it("reports files that cannot be read", async () => {
    const path = join(directory, "missing.txt");

    await runCli(["node", "runewrap", path]);

    expect(stdout.join("")).toContain(`Failed to read ${path}: ENOENT`);
    expect(process.exitCode).toBe(1);
  });

  it("prints the CLI version for -v/--version", async () => {
    await runCli(["node", "runewrap", "--version"]);

    const packageJsonRaw = readFileSync(
      join(__dirname, "../../package.json"),
      "utf-8",
    );
    const parsed: unknown = JSON.parse(packageJsonRaw);
    const version =
      typeof parsed === "object" && parsed !== null && "version" in parsed
        ? String(parsed.version)
        : "";

    expect(stdout.join("").trim()).toBe(version);
    expect(stderr.join("")).toHaveLength(0);
    expect(process.exitCode).toBe(0);
  });
});
