import { CommandFailedError } from "../../ssh/sshClient";
import type { Handler } from "../services";

const COMMAND_PREFIX = /^\s*(?:please\s+)?(?:run|execute|exec)(?:\s+(?:the\s+)?command)?\s*[:]?\s*/i;

/**
 * The command to run: the classifier's data, else the message with a leading
 * "run"/"execute" removed. Surrounding backticks are stripped.
 */
export function resolveCommand(data: string, message: string): string {
  const candidate = data.trim() || message.replace(COMMAND_PREFIX, "");
  return candidate.trim().replace(/^`+|`+$/g, "").trim();
}

export const runCommand: Handler = async ({ intent, message, services }) => {
  const command = resolveCommand(intent.data, message);
  console.log(`[Assistant] Running command: ${command || "(none)"}`);

  if (!command) {
    return { output: "Please provide the command to run.\nExample: `Run command: rpm -q openssl`", ok: false };
  }

  try {
    const output = await services.shell.run(command);
    return { output: `\`$ ${command}\`\n\`\`\`\n${output}\n\`\`\`` };
  } catch (err) {
    if (err instanceof CommandFailedError) {
      return {
        output: `\`$ ${command}\` exited with code ${err.exitCode ?? "unknown"}\n\`\`\`\n${err.output}\n\`\`\``,
        ok: false,
      };
    }
    console.error(`[SSH] Command failed: ${(err as Error).message}`);
    return { output: `Error running command: ${(err as Error).message}`, ok: false };
  }
};
