import { execFile } from "child_process";
import { CommandFailedError } from "../../core/errors";
import type { CommandOptions, CommandResult, CommandRunner } from "../../ports/CommandRunner";

const MAX_BUFFER_BYTES = 16 * 1024 * 1024;

const describeFailure = (command: string, exitCode: number | undefined, notFound: boolean, aborted: boolean) => {
  if (notFound) return `${command} was not found on PATH`;
  if (aborted) return `${command} was aborted`;
  return `${command} exited with code ${exitCode ?? "unknown"}`;
};

/** Runs external tools with `execFile`: no shell, arguments passed verbatim. */
export class ChildProcessCommandRunner implements CommandRunner {
  run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      execFile(
        command,
        args,
        { cwd: options.cwd, signal: options.signal, maxBuffer: MAX_BUFFER_BYTES, encoding: "utf8" },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ stdout, stderr });
            return;
          }

          const code: unknown = error.code;
          const notFound = code === "ENOENT";
          const aborted = error.name === "AbortError" || options.signal?.aborted === true;
          const exitCode = typeof code === "number" ? code : undefined;
          reject(new CommandFailedError({
            command,
            message: describeFailure(command, exitCode, notFound, aborted),
            exitCode,
            stderr: stderr.trim(),
            notFound,
            aborted,
            cause: error
          }));
        }
      );
    });
  }
}
