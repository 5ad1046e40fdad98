export interface RunProcessOptions {
  /** Extra attempts after the first one fails. */
  retries?: number;
  expectedRc?: number;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface ProcessSample {
  command: string;
  success: boolean;
  attempts: number;
  expectedRc: number;
  rc: number | null;
  stdout: string;
  stderr: string;
  timeSeconds: number;
  hostname: string;
}

export interface ProcessRunnerPort {
  run(command: string, args: string[], options?: RunProcessOptions): Promise<ProcessSample>;
}
