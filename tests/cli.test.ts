import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { ExitCode, run } from "../src/cli";
import { makeJpeg, makeTempDir } from "./fixtures";

let root: string;
let args: string[];

beforeEach(() => {
  root = makeTempDir();
  mkdirSync(join(root, "src"));
  mkdirSync(join(root, "dest"));
  writeFileSync(join(root, "src", "a.jpg"), makeJpeg());
  writeFileSync(
    join(root, "log.jsonl"),
    '{"date":"2023-06-01T10:00:00","outfile":"a.jpg","description":"Park"}\n',
  );
  args = [
    "node",
    "photolog-tag",
    "--src",
    join(root, "src"),
    "--dest",
    join(root, "dest"),
    "--logfile",
    join(root, "log.jsonl"),
  ];
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  rmSync(root, { recursive: true, force: true });
});

describe("run", () => {
  test("returns success after tagging", () => {
    expect(run(args)).toBe(ExitCode.Success);
    expect(console.log).toHaveBeenCalledWith(
      `✓ Tagged ${join(root, "dest", "a.jpg")}`,
    );
  });

  test("returns failure when a path does not exist", () => {
    args[3] = join(root, "missing");

    expect(run(args)).toBe(ExitCode.Failure);
    expect(console.error).toHaveBeenCalledWith(
      `Error: source path "${join(root, "missing")}" not found`,
    );
  });

  test("returns usage for coordinates out of range", () => {
    expect(run([...args, "--geo", "91,0"])).toBe(ExitCode.Usage);
    expect(console.error).toHaveBeenCalledWith(
      "Error: latitude does not fall in the range (-90, 90)\n",
    );
  });

  test("returns usage for unknown options", () => {
    expect(run([...args, "--gps"])).toBe(ExitCode.Usage);
  });

  test("help exits successfully", () => {
    expect(run(["node", "photolog-tag", "--help"])).toBe(ExitCode.Success);
  });
});
