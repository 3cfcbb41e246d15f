import { describe, it, expect } from "vitest";
import { CommandFailedError } from "../../ssh/sshClient";
import { createTestServices, FakeShell, turnContext } from "../testServices";
import { resolveCommand, runCommand } from "./runCommand";

describe("resolveCommand", () => {
  it("prefers the classifier's data", () => {
    expect(resolveCommand("uname -r", "Run command: uname -a")).toBe("uname -r");
  });

  it("strips the run prefix and backticks from the message", () => {
    expect(resolveCommand("", "Run command: `rpm -q openssl`")).toBe("rpm -q openssl");
    expect(resolveCommand("", "please execute df -h")).toBe("df -h");
  });
});

describe("runCommand", () => {
  it("returns the command output", async () => {
    const shell = new FakeShell(() => "openssl-3.0.7-27.el9.x86_64");
    const result = await runCommand(
      turnContext(createTestServices({ shell }), { intent: "RUN_COMMAND", data: "rpm -q openssl" })
    );

    expect(shell.commands).toEqual(["rpm -q openssl"]);
    expect(result.output).toBe("`$ rpm -q openssl`\n```\nopenssl-3.0.7-27.el9.x86_64\n```");
  });

  it("shows the exit code of a failing command", async () => {
    const shell = new FakeShell(command => {
      throw new CommandFailedError(command, 1, "package nginx is not installed");
    });
    const result = await runCommand(
      turnContext(createTestServices({ shell }), { intent: "RUN_COMMAND", data: "rpm -q nginx" })
    );

    expect(result).toEqual({
      output: "`$ rpm -q nginx` exited with code 1\n```\npackage nginx is not installed\n```",
      ok: false,
    });
  });

  it("reports connection errors", async () => {
    const shell = new FakeShell(() => {
      throw new Error("connect ECONNREFUSED");
    });
    const result = await runCommand(turnContext(createTestServices({ shell }), { data: "uptime" }));
    expect(result).toEqual({ output: "Error running command: connect ECONNREFUSED", ok: false });
  });

  it("asks for a command when none is given", async () => {
    const result = await runCommand(turnContext(createTestServices(), { message: "run" }));
    expect(result.ok).toBe(false);
    expect(result.output).toBe("Please provide the command to run.\nExample: `Run command: rpm -q openssl`");
  });
});
