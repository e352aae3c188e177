import fs from "fs";
import os from "os";
import path from "path";
import { Values } from "@repokit/options";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { ExecCommand, parseEnvEntries } from "../../../src/cli/commands/exec.command";
import { HookRunnerService } from "../../../src/cli/process/hook-runner.service";
import type {
  ProcessRequest,
  ProcessResult,
} from "../../../src/cli/process/process-runner.service";
import { createDispatcher } from "./command.fixture";

describe("ExecCommand", () => {
  const originalCwd = process.cwd();
  let tempDir: string;
  let runner: { run: Mock<(request: ProcessRequest) => Promise<ProcessResult>> };

  const dispatch = (argv: string[], defaults = new Values()) => {
    const { dispatcher } = createDispatcher([
      new ExecCommand(runner, new HookRunnerService(runner)),
    ]);
    return dispatcher.dispatchArgv(argv, defaults);
  };

  const commands = () => runner.run.mock.calls.map(([request]) => request.command);

  beforeEach(() => {
    vi.stubEnv("REPOKIT_HOOK_PATH", "");
    tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "repokit-exec-")));
    runner = {
      run: vi
        .fn<(request: ProcessRequest) => Promise<ProcessResult>>()
        .mockResolvedValue({ exitCode: 0, stdout: "", stderr: "" }),
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    process.chdir(originalCwd);
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("runs the program in the working directory with the extra environment", async () => {
    const outcome = await dispatch([
      "exec",
      "-w",
      tempDir,
      "-e",
      "GREETING=hi",
      "echo",
      "a",
      "b",
    ]);

    expect(outcome).toEqual({ kind: "ok" });
    expect(runner.run).toHaveBeenCalledWith({
      command: "echo",
      args: ["a", "b"],
      cwd: tempDir,
      env: expect.objectContaining({ GREETING: "hi" }),
    });
  });

  it("forwards the program output", async () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    runner.run.mockResolvedValue({ exitCode: 0, stdout: "hello\n", stderr: "" });

    await dispatch(["exec", "echo", "hello"]);

    expect(write).toHaveBeenCalledWith("hello\n");
  });

  it("only reports the program in a dry run", async () => {
    await expect(dispatch(["exec", "--dry-run", "echo"])).resolves.toEqual({
      kind: "ok",
    });
    expect(runner.run).not.toHaveBeenCalled();
  });

  it("takes a dry run from the configured defaults", async () => {
    await dispatch(["exec", "echo"], new Values({ tryrun: true }));

    expect(runner.run).not.toHaveBeenCalled();
  });

  it("accepts options injected for it", async () => {
    await dispatch(["exec", "--inject-option", "exec:tryrun", "echo"]);

    expect(runner.run).not.toHaveBeenCalled();
  });

  it("runs under its alias", async () => {
    await dispatch(["run", "true"]);

    expect(runner.run).toHaveBeenCalledWith(
      expect.objectContaining({ command: "true", args: [] })
    );
  });

  it("fails without a program", async () => {
    const outcome = await dispatch(["exec"]);

    expect(outcome).toMatchObject({
      kind: "domain-error",
      error: expect.objectContaining({
        name: "OptionMissedError",
        message: "exec: no program given",
      }),
    });
  });

  it("fails for a non-zero exit status", async () => {
    runner.run.mockResolvedValue({ exitCode: 3, stdout: "", stderr: "" });

    const outcome = await dispatch(["exec", "false", "now"]);

    expect(outcome).toMatchObject({
      kind: "domain-error",
      error: { message: "false now exited with status 3" },
    });
  });

  it("tolerates a non-zero exit status on request", async () => {
    runner.run.mockResolvedValue({ exitCode: 3, stdout: "", stderr: "" });

    await expect(
      dispatch(["exec", "--ignore-exit-code", "false"])
    ).resolves.toEqual({ kind: "ok" });
  });

  it("fails when the program cannot be started", async () => {
    runner.run.mockRejectedValue(new Error("spawn nope ENOENT"));

    const outcome = await dispatch(["exec", "nope"]);

    expect(outcome).toMatchObject({
      kind: "domain-error",
      error: { message: "Cannot run nope: spawn nope ENOENT" },
    });
  });

  it("fails for a malformed environment entry", async () => {
    const outcome = await dispatch(["exec", "-e", "1A=x", "echo"]);

    expect(outcome).toMatchObject({
      kind: "domain-error",
      error: { message: "Invalid environment entry: 1A=x" },
    });
    expect(runner.run).not.toHaveBeenCalled();
  });

  describe("hooks", () => {
    const writeHook = (...segments: string[]) => {
      const file = path.join(tempDir, ...segments);
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, "#!/bin/sh\n", { mode: 0o755 });
      return file;
    };

    it("runs hooks named by extra options around the program", async () => {
      const pre = writeHook("pre.sh");
      const post = writeHook("post.sh");

      const outcome = await dispatch([
        "exec",
        "-w",
        tempDir,
        "--extra-option",
        "hook:pre-exec=pre.sh",
        "--extra-option",
        "hook:post-exec=post.sh",
        "--extra-option",
        "hook:post-exec-args=done now",
        "echo",
      ]);

      expect(outcome).toEqual({ kind: "ok" });
      expect(commands()).toEqual([pre, "echo", post]);
      expect(runner.run.mock.calls[2][0]).toMatchObject({
        args: ["done", "now"],
        cwd: tempDir,
      });
    });

    it("looks hooks up in the hook directory", async () => {
      const post = writeHook("hooks", "post-exec");

      await dispatch(["exec", "-w", tempDir, "--hook-dir", "hooks", "echo"]);

      expect(commands()).toEqual(["echo", post]);
    });

    it("looks hooks up in the hook path from the environment", async () => {
      const pre = writeHook("env-hooks", "pre-exec");
      vi.stubEnv("REPOKIT_HOOK_PATH", path.join(tempDir, "env-hooks"));

      await dispatch(["exec", "echo"]);

      expect(commands()).toEqual([pre, "echo"]);
    });

    it("does not run the program after a failing pre-exec hook", async () => {
      writeHook("hooks", "pre-exec");
      runner.run.mockResolvedValueOnce({ exitCode: 2, stdout: "", stderr: "" });

      const outcome = await dispatch([
        "exec",
        "-w",
        tempDir,
        "--hook-dir",
        "hooks",
        "echo",
      ]);

      expect(outcome).toMatchObject({
        kind: "domain-error",
        error: { message: "Hook pre-exec exited with status 2" },
      });
      expect(runner.run).toHaveBeenCalledTimes(1);
    });

    it("skips the post-exec hook when the program fails", async () => {
      writeHook("hooks", "post-exec");
      runner.run.mockResolvedValueOnce({ exitCode: 1, stdout: "", stderr: "" });

      await dispatch(["exec", "-w", tempDir, "--hook-dir", "hooks", "false"]);

      expect(commands()).toEqual(["false"]);
    });

    it("only reports hooks in a dry run", async () => {
      writeHook("hooks", "pre-exec");
      writeHook("hooks", "post-exec");

      await dispatch([
        "exec",
        "--dry-run",
        "-w",
        tempDir,
        "--hook-dir",
        "hooks",
        "echo",
      ]);

      expect(runner.run).not.toHaveBeenCalled();
    });
  });
});

describe("parseEnvEntries", () => {
  it("splits entries at the first equals sign", () => {
    expect(parseEnvEntries(["A=1", "B=x=y", "EMPTY="])).toEqual({
      A: "1",
      B: "x=y",
      EMPTY: "",
    });
  });
});
