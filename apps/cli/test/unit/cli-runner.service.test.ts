import fs from "fs/promises";
import os from "os";
import path from "path";
import { ConfigFile, DefaultConfigLoader } from "@repokit/config";
import type { LoggerEvent, LoggerService } from "@repokit/io";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CliRunnerService } from "../../src/cli/cli-runner.service";
import { commandFailed } from "../../src/cli/commands/cli-command";
import { ProcessingError } from "../../src/cli/errors";
import {
  createDispatcher,
  createLoggerService,
  createStubCommand,
  declareRemote,
  type StubCommand,
} from "./commands/command.fixture";

describe("CliRunnerService", () => {
  let tempDir: string;
  let systemConfigPath: string;
  let sync: StubCommand;
  let loggerService: LoggerService;
  let events: LoggerEvent[];

  const createRunner = () => {
    const { dispatcher } = createDispatcher([sync], loggerService);
    const loader = new DefaultConfigLoader(
      {
        systemConfigPath,
        userConfigPath: path.join(tempDir, "user.yaml"),
      },
      loggerService.getLogger("config")
    );
    return new CliRunnerService(loader, dispatcher, loggerService);
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "repokit-runner-"));
    systemConfigPath = path.join(tempDir, "system.yaml");
    sync = createStubCommand("sync", { declare: declareRemote });
    loggerService = createLoggerService();
    events = [];
    loggerService.registerListener((event) => events.push(event));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("returns 0 when the command ran", async () => {
    await expect(createRunner().run(["sync", "--remote", "origin"])).resolves.toBe(0);

    const [context] = sync.execute.mock.calls[0];
    expect(context.options.get("remote")).toBe("origin");
  });

  it("passes the configured defaults to the command", async () => {
    await fs.writeFile(systemConfigPath, "remote: mirror\n");

    await createRunner().run(["sync"]);

    const [context] = sync.execute.mock.calls[0];
    expect(context.options.get("remote")).toBe("mirror");
  });

  it("drops a leading argument separator", async () => {
    await createRunner().run(["--", "sync", "-T"]);

    const [context] = sync.execute.mock.calls[0];
    expect(context.options.get("tryrun")).toBe(true);
    expect(context.args).toEqual([]);
  });

  it("returns 1 and logs unknown commands", async () => {
    await expect(createRunner().run(["nope"])).resolves.toBe(1);

    expect(events).toContainEqual({
      level: "error",
      args: ["Unknown command: nope"],
    });
  });

  it("returns 1 for options the command does not declare", async () => {
    await expect(createRunner().run(["sync", "--bogus"])).resolves.toBe(1);

    expect(events).toContainEqual({
      level: "error",
      args: ["Unknown option: --bogus"],
    });
    expect(sync.execute).not.toHaveBeenCalled();
  });

  it("returns 1 for a malformed config file", async () => {
    await fs.writeFile(systemConfigPath, "- one\n- two\n");

    await expect(createRunner().run(["sync"])).resolves.toBe(1);

    expect(events).toContainEqual({
      level: "error",
      args: [`${path.resolve(systemConfigPath)}: the document root must be a mapping`],
    });
  });

  it("returns 0 after a domain error", async () => {
    sync.execute.mockResolvedValue(commandFailed(new ProcessingError("rejected")));

    await expect(createRunner().run(["sync"])).resolves.toBe(0);
  });

  it("rethrows unexpected errors", async () => {
    sync.execute.mockRejectedValue(new TypeError("broken"));

    await expect(createRunner().run(["sync"])).rejects.toThrowError(
      new TypeError("broken")
    );
  });

  it("applies the configured log level", async () => {
    await fs.writeFile(systemConfigPath, "logLevel: warn\n");

    await createRunner().run(["sync"]);

    expect(loggerService.getLevel()).toBe("warn");
  });

  it("derives the log level from a configured verbosity", async () => {
    await fs.writeFile(systemConfigPath, "verbose: 1\n");

    await createRunner().run(["sync"]);

    expect(loggerService.getLevel()).toBe("debug");
  });

  it("lets the command line verbosity win over the configured level", async () => {
    await fs.writeFile(systemConfigPath, "logLevel: warn\n");

    await createRunner().run(["sync", "-vv"]);

    expect(loggerService.getLevel()).toBe("trace");
  });

  it("reads the config files once across runs", async () => {
    const read = vi.spyOn(ConfigFile, "read");
    const runner = createRunner();

    await runner.run(["sync"]);
    const readsAfterFirstRun = read.mock.calls.length;
    await runner.run(["sync"]);

    expect(readsAfterFirstRun).toBe(2);
    expect(read).toHaveBeenCalledTimes(2);
    read.mockRestore();
  });
});
