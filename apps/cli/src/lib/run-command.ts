import { spawn } from "child_process";
import { once } from "events";

export interface RunCommandOptions {
  /** Written to the child's stdin, which is then closed. */
  input?: string;
  /** Exit codes that count as success. Defaults to `[0]`. */
  allowedExitCodes?: number[];
  env?: NodeJS.ProcessEnv;
  verbose?: boolean;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export class CommandError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly stderr: string,
    readonly stdout: string
  ) {
    super(
      `${command} exited with code ${exitCode}\nStderr:\n${stderr}\nStdout:\n${stdout}`
    );
    this.name = "CommandError";
  }
}

export const runCommand = async (
  bin: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<CommandResult> => {
  const { input, allowedExitCodes = [0], env, verbose = false } = options;

  const child = spawn(bin, args, {
    stdio: ["pipe", "pipe", "pipe"],
    shell: false,
    env,
  });
  if (verbose) {
    console.log(`Running command: ${bin} ${args.join(" ")}`);
  }

  let stdoutData = "";
  let stderrData = "";

  child.stdout.setEncoding("utf8");
  child.stderr.setEncoding("utf8");
  child.stdout.on("data", (text: string) => {
    stdoutData += text;
  });
  child.stderr.on("data", (text: string) => {
    stderrData += text;
  });

  // A child that exits before reading all input closes the pipe (EPIPE);
  // its exit code is what gets reported then
  let stdinError: Error | undefined;
  child.stdin.on("error", (error: NodeJS.ErrnoException) => {
    if (error.code !== "EPIPE") {
      stdinError = error;
    }
  });
  child.stdin.end(input ?? "", "utf8");

  // Rejects on "error", e.g. when the binary is missing
  const [exitCode] = (await once(child, "close")) as [
    number | null,
    NodeJS.Signals | null,
  ];

  if (exitCode === null || !allowedExitCodes.includes(exitCode)) {
    throw new CommandError(bin, exitCode, stderrData, stdoutData);
  }
  if (stdinError) {
    throw stdinError;
  }

  return { exitCode, stdout: stdoutData, stderr: stderrData };
};
