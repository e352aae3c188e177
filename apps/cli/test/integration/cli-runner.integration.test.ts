import "reflect-metadata";

import fs from "fs/promises";
import os from "os";
import path from "path";
import { Test, type TestingModule } from "@nestjs/testing";
import { LoggerService } from "@repokit/io";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { AppModule } from "../../src/app.module";
import { CliRunnerService } from "../../src/cli/cli-runner.service";
import {
  ProcessRunnerService,
  type ProcessRequest,
  type ProcessResult,
} from "../../src/cli/process/process-runner.service";

describe("repokit CLI", () => {
  let tempDir: string;
  let systemConfigPath: string;
  let moduleRef: TestingModule;
  let runner: { run: Mock<(request: ProcessRequest) => Promise<ProcessResult>> };

  const bootstrap = async (): Promise<CliRunnerService> => {
    moduleRef = await Test.createTestingModule({
      imports: [
        AppModule.forRoot({
          systemConfigPath,
          userConfigPath: path.join(tempDir, "user.yaml"),
        }),
      ],
    })
      .overrideProvider(ProcessRunnerService)
      .useValue(runner)
      .compile();

    moduleRef.get(LoggerService).configure({
      level: "silent",
      destination: { type: "stderr", pretty: false },
    });
    return moduleRef.get(CliRunnerService);
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "repokit-cli-"));
    systemConfigPath = path.join(tempDir, "system.yaml");
    runner = {
      run: vi
        .fn<(request: ProcessRequest) => Promise<ProcessResult>>()
        .mockResolvedValue({ exitCode: 0, stdout: "", stderr: "" }),
    };
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await moduleRef.close();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("runs a program through exec", async () => {
    const cli = await bootstrap();

    await expect(cli.run(["exec", "-w", tempDir, "git", "status"])).resolves.toBe(0);

    expect(runner.run).toHaveBeenCalledWith(
      expect.objectContaining({ command: "git", args: ["status"] })
    );
  });

  it("applies a dry run from the system config file", async () => {
    await fs.writeFile(systemConfigPath, "tryrun: true\n");
    const cli = await bootstrap();

    await expect(cli.run(["exec", "git", "status"])).resolves.toBe(0);

    expect(runner.run).not.toHaveBeenCalled();
  });

  it("lets the command line override the config file", async () => {
    await fs.writeFile(systemConfigPath, "tryrun: true\n");
    const cli = await bootstrap();

    await cli.run(["exec", "--dry-run=false", "git", "status"]);

    expect(runner.run).toHaveBeenCalledTimes(1);
  });

  it("runs every project of a batch file", async () => {
    const batchFile = path.join(tempDir, "projects.yaml");
    await fs.writeFile(
      batchFile,
      [
        "project:",
        "  alpha:",
        "    schema: exec",
        "    args: git fetch",
        "  beta:",
        "    schema: run",
        "    args: [git, gc]",
        "",
      ].join("\n")
    );
    const cli = await bootstrap();

    await expect(cli.run(["batch", "-w", tempDir, batchFile])).resolves.toBe(0);

    expect(runner.run.mock.calls.map(([request]) => request.args)).toEqual([
      ["fetch"],
      ["gc"],
    ]);
  });

  it("prints the command list", async () => {
    const cli = await bootstrap();

    await expect(cli.run(["help"])).resolves.toBe(0);

    expect(console.log).toHaveBeenCalledWith("- batch: Run the projects listed in batch files");
  });

  it("exits with 1 for an unknown command", async () => {
    const cli = await bootstrap();

    await expect(cli.run(["nope"])).resolves.toBe(1);
  });
});
