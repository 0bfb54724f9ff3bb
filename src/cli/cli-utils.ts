import type { RuntimeEnv } from "../runtime.js";

/** Exit status carried by an error, e.g. 2 for configuration errors; 1 otherwise. */
export function exitCodeOf(err: unknown): number {
  if (err instanceof Error && "exitCode" in err && typeof err.exitCode === "number") return err.exitCode;
  return 1;
}

/**
 * Run a command action: a returned non-zero code or a thrown error ends
 * the process with that status.
 */
export async function runCommandWithRuntime(
  runtime: RuntimeEnv,
  action: () => Promise<number | void>,
  onError?: (err: unknown) => void,
): Promise<void> {
  let code: number | void;
  try {
    code = await action();
  } catch (err) {
    if (onError) onError(err);
    else runtime.error(err instanceof Error ? err.message : String(err));
    runtime.exit(exitCodeOf(err));
  }
  if (typeof code === "number" && code !== 0) runtime.exit(code);
}
