import { spawn } from "node:child_process";

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type CommandOptions = {
  cwd: string;
  /** Called with each complete line the command writes, from either stream. */
  onLine?: (line: string) => void;
};

/** Runs an external command to completion. Rejects only when it cannot be started. */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: CommandOptions,
) => Promise<CommandResult>;

function lineSplitter(onLine: ((line: string) => void) | undefined) {
  let pending = "";
  return {
    push(chunk: string): void {
      if (!onLine) return;
      pending += chunk;
      const lines = pending.split(/\r?\n/);
      pending = lines.pop() ?? "";
      for (const line of lines) onLine(line);
    },
    flush(): void {
      if (onLine && pending) onLine(pending);
      pending = "";
    },
  };
}

export const spawnCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: process.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    const out = lineSplitter(options.onLine);
    const err = lineSplitter(options.onLine);

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
      out.push(chunk);
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
      err.push(chunk);
    });

    child.once("error", reject);
    child.once("close", (code) => {
      out.flush();
      err.flush();
      resolve({ exitCode: code ?? 1, stdout, stderr });
    });
  });
