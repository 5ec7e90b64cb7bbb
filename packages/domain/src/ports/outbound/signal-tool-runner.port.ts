export interface ToolRunOptions {
  timeoutMs: number;
  cwd?: string;
}

export interface ToolRunResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export interface SignalToolRunnerPort {
  /**
   * Runs the executable to completion. A non-zero exit is reported through
   * `exitCode`, not thrown. Spawn failures throw `ToolConfigurationError`,
   * exceeding `timeoutMs` throws `ToolTimeoutError`.
   */
  run(toolPath: string, args: readonly string[], opts: ToolRunOptions): Promise<ToolRunResult>;
}
