import { spawn } from "child_process";
import { hostname } from "os";
import type {
  ProcessRunnerPort,
  ProcessSample,
  RunProcessOptions,
} from "../../ports/process/ProcessRunnerPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";

interface AttemptOutcome {
  rc: number | null;
  stdout: string;
  stderr: string;
}

export class ChildProcessRunner implements ProcessRunnerPort {
  constructor(private readonly logger: LoggerPort) {}

  async run(
    command: string,
    args: string[],
    options: RunProcessOptions = {}
  ): Promise<ProcessSample> {
    const { retries = 0, expectedRc = 0, env, cwd } = options;
    const maxAttempts = Math.max(1, retries + 1);
    const commandLine = [command, ...args].join(" ");

    let attempts = 0;
    let outcome: AttemptOutcome = { rc: null, stdout: "", stderr: "" };
    const startedAt = Date.now();

    while (attempts < maxAttempts) {
      attempts++;
      this.logger.debug(`Running "${commandLine}"`, { attempt: attempts, maxAttempts });
      outcome = await this.attempt(command, args, env, cwd);
      if (outcome.rc === expectedRc) break;
      this.logger.warn(`"${commandLine}" exited with ${outcome.rc}, expected ${expectedRc}`, {
        attempt: attempts,
        maxAttempts,
      });
    }

    return {
      command: commandLine,
      success: outcome.rc === expectedRc,
      attempts,
      expectedRc,
      rc: outcome.rc,
      stdout: outcome.stdout,
      stderr: outcome.stderr,
      timeSeconds: (Date.now() - startedAt) / 1000,
      hostname: hostname(),
    };
  }

  private attempt(
    command: string,
    args: string[],
    env: NodeJS.ProcessEnv | undefined,
    cwd: string | undefined
  ): Promise<AttemptOutcome> {
    return new Promise<AttemptOutcome>((resolve) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;

      const finish = (rc: number | null, extraStderr?: string) => {
        if (settled) return;
        settled = true;
        let errText = Buffer.concat(stderr).toString("utf8");
        if (extraStderr) errText = errText ? `${errText}\n${extraStderr}` : extraStderr;
        resolve({ rc, stdout: Buffer.concat(stdout).toString("utf8"), stderr: errText });
      };

      const child = spawn(command, args, {
        stdio: ["ignore", "pipe", "pipe"],
        env: env ?? process.env,
        cwd,
      });

      child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));
      child.on("error", (err) => finish(null, err.message));
      child.on("close", (code) => finish(code));
    });
  }
}
