export type CommandOptions = {
  cwd?: string;
  signal?: AbortSignal;
};

export type CommandResult = {
  stdout: string;
  stderr: string;
};

/** Runs an external tool. Rejects with `CommandFailedError`. */
export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
}
