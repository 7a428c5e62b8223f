import { execFile } from "node:child_process";

const DEFAULT_TIMEOUT = 300_000;
const MAX_OUTPUT = 10 * 1024 * 1024;

export type CommandResult = {
  /** Null when the process could not be spawned or was killed. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  error?: string;
};

export type CommandOptions = {
  cwd?: string;
  timeout?: number;
  maxBuffer?: number;
};

export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => Promise<CommandResult>;

export const runCommand: CommandRunner = (command, args, options = {}) => {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;
  const maxBuffer = options.maxBuffer ?? MAX_OUTPUT;
  return new Promise((resolve) => {
    execFile(command, args, { cwd: options.cwd, timeout, maxBuffer }, (error, stdout, stderr) => {
      if (!error) {
        resolve({ exitCode: 0, stdout, stderr });
        return;
      }
      const exitCode = typeof error.code === "number" ? error.code : null;
      let message = stderr.trim() || error.message;
      if (error.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
        message = `Command output exceeded ${maxBuffer} bytes`;
      } else if (error.killed) {
        message = `Command timed out after ${timeout}ms`;
      }
      resolve({ exitCode, stdout, stderr, error: message });
    });
  });
};
