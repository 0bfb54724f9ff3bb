/**
 * GCP Extension: Remote execution over `gcloud compute ssh`.
 *
 * The script is piped to `bash -s` on the instance, so nothing is copied
 * to the remote filesystem.
 */

import { execFile } from "node:child_process";

export type RemoteTarget = {
  instance: string;
  zone: string;
  projectId: string;
};

/** Runs a shell script on an instance and resolves with its stdout. */
export interface RemoteExecutor {
  run(target: RemoteTarget, script: string): Promise<string>;
}

export type GcloudSshOptions = {
  /** Kill the ssh session after this many milliseconds (default 60 000). */
  timeoutMs?: number;
  gcloudPath?: string;
};

export class RemoteExecutionError extends Error {
  constructor(
    message: string,
    public readonly instance: string,
    public readonly stderr: string = "",
  ) {
    super(message);
    this.name = "RemoteExecutionError";
  }
}

/** `gcloud compute ssh` arguments for running a script read from stdin. */
export function buildSshArgs(target: RemoteTarget): string[] {
  return [
    "compute",
    "ssh",
    target.instance,
    `--zone=${target.zone}`,
    `--project=${target.projectId}`,
    "--quiet",
    "--command=bash -s",
  ];
}

export class GcloudSshExecutor implements RemoteExecutor {
  private readonly timeoutMs: number;
  private readonly gcloudPath: string;

  constructor(options: GcloudSshOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.gcloudPath = options.gcloudPath ?? "gcloud";
  }

  run(target: RemoteTarget, script: string): Promise<string> {
    return new Promise((resolve, reject) => {
      // gcloud may exit before reading the script; the pipe then fails with EPIPE
      let stdinError: Error | undefined;

      const child = execFile(
        this.gcloudPath,
        buildSshArgs(target),
        { encoding: "utf8", timeout: this.timeoutMs, maxBuffer: 10 * 1024 * 1024 },
        (err, stdout, stderr) => {
          if (err) {
            reject(new RemoteExecutionError(`ssh to ${target.instance} failed: ${err.message}`, target.instance, stderr.trim()));
            return;
          }
          if (stdinError) {
            reject(
              new RemoteExecutionError(
                `ssh to ${target.instance} failed: could not send script: ${stdinError.message}`,
                target.instance,
                stderr.trim(),
              ),
            );
            return;
          }
          resolve(stdout);
        },
      );

      child.stdin?.on("error", (err) => {
        stdinError = err;
      });
      child.stdin?.end(script);
    });
  }
}
