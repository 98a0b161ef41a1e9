import { runCapturedCommand, type CapturedCommandResult } from "./command-runner.js";

export interface LocalConnection {
  readonly host: string;
  run(command: string): Promise<CapturedCommandResult>;
}

/** Runs commands through the local shell, for harnesses executing on the host itself. */
export function createLocalConnection(timeoutMs: number, host = "local"): LocalConnection {
  return {
    host,
    run: (command) => runCapturedCommand("/bin/sh", ["-c", command], { timeoutMs }),
  };
}
