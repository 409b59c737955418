import { jest, describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from "@jest/globals";
import chalk from "chalk";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { runProbe, createProgram, EXIT_FAILURE, EXIT_OK } from "./program.js";
import { DEFAULT_CLI_OPTIONS } from "./config.js";
import type { onShutdownSignal } from "./signals.js";
import type { Fetcher } from "../sdk/types.js";

type MockFetch = jest.Mock<Fetcher>;
type ShutdownRegistrar = typeof onShutdownSignal;

describe("runProbe", () => {
  const originalLevel = chalk.level;
  let dir: string;
  let log: jest.SpiedFunction<typeof console.log>;
  let error: jest.SpiedFunction<typeof console.error>;

  beforeAll(async () => {
    chalk.level = 0;
    dir = await mkdtemp(join(tmpdir(), "fleetping-cli-"));
  });

  afterAll(async () => {
    chalk.level = originalLevel;
    await rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    log = jest.spyOn(console, "log").mockImplementation(() => undefined);
    error = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  async function urlFile(name: string, contents: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, contents);
    return path;
  }

  function logged(): string[] {
    return log.mock.calls.map((args) => String(args[0]));
  }

  it("should fail on invalid flags", async () => {
    const code = await runProbe({ ...DEFAULT_CLI_OPTIONS, concurrency: "0" });

    expect(code).toBe(EXIT_FAILURE);
    expect(error).toHaveBeenCalledWith(
      "[fleetping] Invalid flags: --concurrency must be at least 1"
    );
  });

  it("should fail when the URL file cannot be read", async () => {
    const code = await runProbe({
      ...DEFAULT_CLI_OPTIONS,
      urls: join(dir, "does-not-exist.txt"),
    });

    expect(code).toBe(EXIT_FAILURE);
    expect(error).toHaveBeenCalledWith(
      expect.stringContaining("[fleetping] failed to load urls: ENOENT")
    );
  });

  it("should fail when the file lists no URLs", async () => {
    const urls = await urlFile("empty.txt", "# nothing\n\n");

    const code = await runProbe({ ...DEFAULT_CLI_OPTIONS, urls });

    expect(code).toBe(EXIT_FAILURE);
    expect(error).toHaveBeenCalledWith("[fleetping] no urls provided");
  });

  it("should probe every URL and print the summary", async () => {
    const urls = await urlFile(
      "two.txt",
      "a.example.com\n# skipped.example.com\nhttp://b.example.com\n"
    );
    const mockFetch: MockFetch = jest.fn<Fetcher>(
      async () => new Response(null, { status: 200 })
    );
    const dispose = jest.fn();
    const onShutdown = jest.fn<ShutdownRegistrar>(() => dispose);

    const code = await runProbe(
      { ...DEFAULT_CLI_OPTIONS, urls },
      { fetch: mockFetch, onShutdown }
    );

    expect(code).toBe(EXIT_OK);
    expect(mockFetch.mock.calls.map(([input]) => input).sort()).toEqual([
      "http://b.example.com",
      "https://a.example.com",
    ]);
    expect(logged()).toContain("---- summary ----");
    expect(logged()).toContain("requests: 2, success: 2, failed: 0");
    expect(onShutdown).toHaveBeenCalledTimes(1);
    expect(dispose).toHaveBeenCalledTimes(1);
  });

  it("should cancel the run on the first interrupt", async () => {
    const urls = await urlFile("hang.txt", "https://hang.example.com\n");
    const mockFetch: MockFetch = jest.fn<Fetcher>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (!signal) {
            return;
          }
          signal.addEventListener("abort", () => reject(signal.reason), {
            once: true,
          });
        })
    );
    const onShutdown = jest.fn<ShutdownRegistrar>((handler) => {
      setTimeout(() => handler("SIGINT"), 20);
      return () => undefined;
    });

    const code = await runProbe(
      { ...DEFAULT_CLI_OPTIONS, urls, timeout: "60s" },
      { fetch: mockFetch, onShutdown }
    );

    expect(code).toBe(EXIT_OK);
    expect(logged()).toContain("\nreceived interrupt, shutting down...");
    expect(
      logged().some((line) =>
        line.endsWith("https://hang.example.com ERROR: interrupted")
      )
    ).toBe(true);
    expect(logged()).toContain("requests: 1, success: 0, failed: 1");
    expect(logged()).toContain("run cancelled before completion");
  });
});

describe("createProgram", () => {
  it("should declare every flag with its default", () => {
    const program = createProgram();
    const flags = program.options.map((option) => option.long);

    expect(flags).toEqual(
      expect.arrayContaining([
        "--urls",
        "--concurrency",
        "--rate",
        "--timeout",
        "--count",
        "--interval",
        "--retries",
      ])
    );
    expect(program.opts()).toEqual(
      expect.objectContaining({ ...DEFAULT_CLI_OPTIONS })
    );
  });
});
