export interface HostCommandResult {
  ok: boolean;
  stdout: string;
  stderr: string;
  exitCode?: number;
  error?: string;
}

/** Runs a command on one named host and captures its output. */
export interface HostConnection {
  readonly host: string;
  run(command: string): Promise<HostCommandResult>;
}
