import spawn from "cross-spawn";

export type RunOptions = {
  timeoutMs: number;
  cwd?: string;
  env?: Record<string, string>;
};

export type RunResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
  durationMs: number;
  timedOut: boolean;
  signal: NodeJS.Signals | null;
};

export type RunOutcome =
  | { status: "ok"; result: RunResult }
  | { status: "timeout"; result: RunResult; reason: string }
  | { status: "non-zero-exit"; result: RunResult; reason: string }
  | { status: "failed-to-start"; reason: string; code?: string };

export type CommandRunner = (command: string, args: readonly string[], options: RunOptions) => Promise<RunOutcome>;

export function runCommand(command: string, args: readonly string[], options: RunOptions): Promise<RunResult> {
  return new Promise((resolve, reject) => {
    const start = Date.now();
    // Own process group on POSIX, so a timeout also reaches whatever a wrapper (npx, shims) started.
    const detached = process.platform !== "win32";
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: { ...process.env, ...(options.env ?? {}) },
      stdio: ["ignore", "pipe", "pipe"],
      detached
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const finish = (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      resolve({
        stdout,
        stderr,
        exitCode: code ?? -1,
        durationMs: Date.now() - start,
        timedOut,
        signal
      });
    };

    if (options.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        killTree(child.pid, detached, () => child.kill("SIGKILL"));
        // Grandchildren may still hold the pipes open; stop waiting on them.
        child.stdout?.destroy();
        child.stderr?.destroy();
      }, options.timeoutMs);
    }

    child.stdout?.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on("error", (error) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      reject(error);
    });

    child.on("exit", (code, signal) => {
      if (timedOut) finish(code, signal);
    });
    child.on("close", finish);
  });
}

function killTree(pid: number | undefined, group: boolean, fallback: () => void): void {
  if (pid === undefined || !group) {
    fallback();
    return;
  }
  try {
    process.kill(-pid, "SIGKILL");
  } catch {
    fallback();
  }
}

/**
 * Run a command under a hard timeout and classify what happened. Never
 * rejects: a process that cannot be spawned comes back as `failed-to-start`.
 */
export async function execute(command: string, args: readonly string[], options: RunOptions): Promise<RunOutcome> {
  let result: RunResult;
  try {
    result = await runCommand(command, args, options);
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOENT") {
      return { status: "failed-to-start", reason: `command not found: ${command}`, code };
    }
    return { status: "failed-to-start", reason: error instanceof Error ? error.message : String(error), code };
  }

  if (result.timedOut) {
    return { status: "timeout", result, reason: `timed out after ${options.timeoutMs}ms` };
  }
  if (result.exitCode !== 0) {
    return { status: "non-zero-exit", result, reason: `exited with code ${result.exitCode}` };
  }
  return { status: "ok", result };
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
