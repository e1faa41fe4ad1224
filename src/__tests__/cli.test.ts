import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import fs from "node:fs/promises";
import path from "node:path";
import sharp from "sharp";
import { cleanup, createTestJpeg, tmpDir } from "./helpers.js";

const exec = promisify(execFile);

// Use tsx to run the TypeScript source directly
const CLI = path.resolve("src/index.ts");
const TSX = path.resolve("node_modules/.bin/tsx");

interface ExecFailure {
  code: number;
  stdout: string;
  stderr: string;
}

function isExecFailure(err: unknown): err is ExecFailure {
  return typeof err === "object" && err !== null && "code" in err && "stderr" in err && "stdout" in err;
}

async function runFailing(args: string[], env: NodeJS.ProcessEnv = process.env): Promise<ExecFailure> {
  try {
    await exec(TSX, [CLI, ...args], { env });
  } catch (err: unknown) {
    if (isExecFailure(err)) return err;
    throw err;
  }
  throw new Error("CLI should have exited with an error");
}

describe("CLI", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = tmpDir("cli");
    await fs.mkdir(workDir, { recursive: true });
  });

  afterEach(async () => {
    await cleanup(workDir);
  });

  it("prints help with --help", async () => {
    const { stdout } = await exec(TSX, [CLI, "--help"]);
    expect(stdout).toContain("img-compactor");
    expect(stdout).toContain("Usage:");
    expect(stdout).toContain("--quality");
    expect(stdout).toContain("--from-file");
    expect(stdout).toContain("Supported formats: jpg, jpeg");
  });

  it("prints version with --version", async () => {
    const { stdout } = await exec(TSX, [CLI, "--version"]);
    expect(stdout.trim()).toMatch(/^\d+\.\d+\.\d+$/);
  });

  it("exits with error on no sources", async () => {
    const error = await runFailing([]);
    expect(error.code).toBe(1);
    expect(error.stderr).toContain("no input file or URL specified");
  });

  it("exits with error on unknown flag", async () => {
    const error = await runFailing(["--badopt"]);
    expect(error.code).toBe(1);
    expect(error.stderr).toContain("unknown option: --badopt");
  });

  it("rejects an out of range quality before processing anything", async () => {
    const inputPath = path.join(workDir, "photo.jpg");
    await createTestJpeg(inputPath);
    const outDir = path.join(workDir, "out");

    const error = await runFailing(["-q", "101", "-o", outDir, inputPath]);

    expect(error.code).toBe(1);
    expect(error.stderr).toContain("Quality must be an integer between 0 and 100, got 101");
    await expect(fs.access(outDir)).rejects.toThrow();
  });

  it("shrinks a file into the output directory", async () => {
    const inputPath = path.join(workDir, "cli-test.jpg");
    await createTestJpeg(inputPath, { width: 40, height: 30 });
    const outDir = path.join(workDir, "out");

    const { stdout } = await exec(TSX, [CLI, "-q", "40", "-o", outDir, inputPath]);

    expect(stdout).toContain("Succeeded:    1");
    expect(stdout).toContain("Failed:       0");
    const metadata = await sharp(path.join(outDir, "cli-test.jpg")).metadata();
    expect(metadata.width).toBe(40);
    expect(metadata.height).toBe(30);
  });

  it("reads sources from a file", async () => {
    await createTestJpeg(path.join(workDir, "a.jpg"));
    await createTestJpeg(path.join(workDir, "b.jpeg"));
    const listPath = path.join(workDir, "list.txt");
    await fs.writeFile(
      listPath,
      ["# photos", path.join(workDir, "a.jpg"), "", `  ${path.join(workDir, "b.jpeg")}  `, ""].join("\n"),
    );
    const outDir = path.join(workDir, "out");

    const { stdout } = await exec(TSX, [CLI, "-o", outDir, "--from-file", listPath]);

    expect(stdout).toContain("Total images: 2");
    expect((await fs.readdir(outDir)).sort()).toEqual(["a.jpg", "b.jpeg"]);
  });

  it("reads sources from standard input", async () => {
    await createTestJpeg(path.join(workDir, "one.jpg"));
    await createTestJpeg(path.join(workDir, "two.jpg"));
    const outDir = path.join(workDir, "out");

    const pending = exec(TSX, [CLI, "--stdin", "-o", outDir]);
    pending.child.stdin?.end(["# from a pipe", path.join(workDir, "one.jpg"), "", path.join(workDir, "two.jpg"), ""].join("\n"));
    const { stdout } = await pending;

    expect(stdout).toContain("Total images: 2");
    expect((await fs.readdir(outDir)).sort()).toEqual(["one.jpg", "two.jpg"]);
  });

  it("takes the output directory from the environment", async () => {
    const inputPath = path.join(workDir, "env.jpg");
    await createTestJpeg(inputPath);
    const outDir = path.join(workDir, "env-out");

    await exec(TSX, [CLI, inputPath], { env: { ...process.env, IMG_COMPACTOR_OUTPUT_DIR: outDir } });

    expect(await fs.readdir(outDir)).toEqual(["env.jpg"]);
  });

  it("processes every source and exits 1 when one fails", async () => {
    const good = path.join(workDir, "good.jpg");
    await createTestJpeg(good);
    const bad = path.join(workDir, "bad.png");
    await fs.writeFile(bad, "png-ish");
    const outDir = path.join(workDir, "out");

    const error = await runFailing(["-o", outDir, "--log-level", "silent", bad, good]);

    expect(error.code).toBe(1);
    expect(error.stdout).toContain("Succeeded:    1");
    expect(error.stdout).toContain(`  - ${bad}: Unsupported image format: png`);
    expect(await fs.readdir(outDir)).toEqual(["good.jpg"]);
  });
});
