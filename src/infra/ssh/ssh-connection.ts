import fs from "node:fs/promises";
import os from "node:os";
import { Client, type ConnectConfig } from "ssh2";
import type { CapturedCommandResult } from "../process/command-runner.js";

const DEFAULT_SSH_PORT = 22;

export interface SshTarget {
  host: string;
  user?: string;
  port?: number;
  identityFile?: string;
}

export interface SshConnectionOptions extends SshTarget {
  timeoutMs: number;
}

export interface SshConnection {
  readonly host: string;
  run(command: string): Promise<CapturedCommandResult>;
}

/**
 * Connection settings for a test host. Without an identity file the running
 * ssh-agent is used. Host keys are not verified: test hosts are reprovisioned
 * between runs, so their keys change.
 */
export async function buildConnectConfig(
  target: SshTarget,
  timeoutMs: number
): Promise<ConnectConfig> {
  const config: ConnectConfig = {
    host: target.host,
    port: target.port ?? DEFAULT_SSH_PORT,
    username: target.user ?? os.userInfo().username,
    readyTimeout: timeoutMs,
  };
  if (target.identityFile) {
    config.privateKey = await fs.readFile(target.identityFile, "utf-8");
  } else if (process.env.SSH_AUTH_SOCK) {
    config.agent = process.env.SSH_AUTH_SOCK;
  }
  return config;
}

/** Opens a session, runs one command and closes the session. */
export function execOverSsh(
  config: ConnectConfig,
  command: string,
  timeoutMs: number
): Promise<CapturedCommandResult> {
  return new Promise((resolve) => {
    const client = new Client();
    let stdout = "";
    let stderr = "";
    let exitCode: number | null = null;
    let exitSignal: string | undefined;
    let settled = false;

    const finish = (result: CapturedCommandResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      client.end();
      resolve(result);
    };

    const timer = setTimeout(() => {
      finish({
        ok: false,
        stdout,
        stderr,
        error: `Command timed out after ${timeoutMs}ms`,
        timedOut: true,
      });
    }, timeoutMs);

    client.on("ready", () => {
      client.exec(command, (err, stream) => {
        if (err) {
          finish({ ok: false, stdout, stderr, error: `Failed to start command: ${err.message}` });
          return;
        }

        stream.on("data", (chunk: Buffer) => {
          stdout += chunk.toString("utf-8");
        });
        stream.stderr.on("data", (chunk: Buffer) => {
          stderr += chunk.toString("utf-8");
        });
        stream.on("exit", (code: number | null, signal?: string) => {
          exitCode = code;
          exitSignal = signal;
        });
        stream.on("close", () => {
          if (exitCode === 0) {
            finish({ ok: true, stdout, stderr, exitCode });
          } else if (exitCode !== null) {
            finish({ ok: false, stdout, stderr, exitCode, error: `Command exited with code ${exitCode}` });
          } else {
            finish({
              ok: false,
              stdout,
              stderr,
              error: `Command terminated by signal ${exitSignal ?? "unknown"}`,
            });
          }
        });
      });
    });

    client.on("error", (err) => {
      finish({ ok: false, stdout, stderr, error: `SSH connection failed: ${err.message}` });
    });

    client.connect(config);
  });
}

export function createSshConnection(options: SshConnectionOptions): SshConnection {
  return {
    host: options.host,
    run: async (command) => {
      let config: ConnectConfig;
      try {
        config = await buildConnectConfig(options, options.timeoutMs);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return {
          ok: false,
          stdout: "",
          stderr: "",
          error: `Failed to read identity file ${options.identityFile ?? ""}: ${message}`,
        };
      }
      return execOverSsh(config, command, options.timeoutMs);
    },
  };
}
