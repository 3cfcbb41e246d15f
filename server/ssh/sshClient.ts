/**
 * SSH command runner for the remediation target host.
 *
 * One connection is opened lazily on the first command and reused for the
 * rest of the process. Commands exiting non-zero raise CommandFailedError.
 */

import ssh2 from "ssh2";
import type { Client, ConnectConfig } from "ssh2";
import { ENV } from "../_core/env";

const EMPTY_OUTPUT = "Command executed successfully.";
const CONNECT_TIMEOUT_MS = 20_000;

export interface CommandRunner {
  run(command: string): Promise<string>;
}

export class CommandFailedError extends Error {
  readonly exitCode: number | null;
  readonly output: string;

  constructor(command: string, exitCode: number | null, output: string) {
    super(`Command "${command}" exited with code ${exitCode ?? "unknown"}${output ? `: ${output}` : ""}`);
    this.name = "CommandFailedError";
    this.exitCode = exitCode;
    this.output = output;
  }
}

export function isSshConfigured(): boolean {
  return !!ENV.sshHostname && !!ENV.sshUser;
}

function getConnectConfig(): ConnectConfig {
  return {
    host: ENV.sshHostname,
    port: ENV.sshPort,
    username: ENV.sshUser,
    password: ENV.sshPassword || undefined,
    readyTimeout: CONNECT_TIMEOUT_MS,
  };
}

/**
 * Combine captured streams the way an operator reads them: stdout when there
 * is any, otherwise stderr, otherwise a fixed acknowledgement.
 */
export function formatCommandOutput(stdout: string, stderr: string): string {
  const out = stdout.trim();
  if (out) return out;
  const err = stderr.trim();
  return err || EMPTY_OUTPUT;
}

export class SshCommandRunner implements CommandRunner {
  private client: Client | null = null;
  private connecting: Promise<Client> | null = null;

  constructor(private readonly config: ConnectConfig = getConnectConfig()) {}

  private connect(): Promise<Client> {
    if (this.client) return Promise.resolve(this.client);
    if (this.connecting) return this.connecting;

    if (!this.config.host || !this.config.username) {
      return Promise.reject(new Error("[SSH] Not configured. Set SSH_HOSTNAME, SSH_USER and SSH_PASSWD."));
    }

    this.connecting = new Promise<Client>((resolve, reject) => {
      const client = new ssh2.Client();
      client
        .on("ready", () => {
          console.log(`[SSH] Connected to ${this.config.host}:${this.config.port ?? 22}`);
          this.client = client;
          this.connecting = null;
          resolve(client);
        })
        .on("error", err => {
          console.error(`[SSH] Connection error: ${err.message}`);
          this.client = null;
          this.connecting = null;
          reject(err);
        })
        .on("close", () => {
          this.client = null;
        })
        .connect(this.config);
    });
    return this.connecting;
  }

  async run(command: string): Promise<string> {
    const client = await this.connect();
    console.log(`[SSH] $ ${command}`);

    return new Promise<string>((resolve, reject) => {
      client.exec(command, (err, stream) => {
        if (err) {
          reject(err);
          return;
        }

        let stdout = "";
        let stderr = "";
        stream.on("data", (chunk: Buffer) => {
          stdout += chunk.toString("utf8");
        });
        stream.stderr.on("data", (chunk: Buffer) => {
          stderr += chunk.toString("utf8");
        });
        stream.on("close", (code: number | null) => {
          const output = formatCommandOutput(stdout, stderr);
          if (code !== 0 && code !== null) {
            reject(new CommandFailedError(command, code, output));
            return;
          }
          resolve(output);
        });
      });
    });
  }

  close(): void {
    this.client?.end();
    this.client = null;
  }
}
