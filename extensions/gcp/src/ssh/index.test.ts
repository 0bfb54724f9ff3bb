import { Writable } from "node:stream";
import { describe, it, expect, vi, beforeEach } from "vitest";

type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void;

const execFileMock = vi.hoisted(() =>
  vi.fn<(file: string, args: string[], options: object, callback: ExecCallback) => { stdin: Writable }>(),
);

vi.mock("node:child_process", () => ({ execFile: execFileMock }));

import { GcloudSshExecutor, RemoteExecutionError, buildSshArgs } from "./index.js";

const target = { instance: "vm-1", zone: "us-central1-a", projectId: "test-project" };

/** stdin whose reader has already gone away. */
function closedPipe(): Writable {
  return new Writable({
    write(_chunk, _encoding, callback) {
      callback(Object.assign(new Error("write EPIPE"), { code: "EPIPE" }));
    },
  });
}

function collectingPipe(received: string[]): Writable {
  return new Writable({
    write(chunk, _encoding, callback) {
      received.push(String(chunk));
      callback();
    },
  });
}

beforeEach(() => {
  execFileMock.mockReset();
});

describe("buildSshArgs", () => {
  it("targets the instance and pipes the script to bash", () => {
    expect(buildSshArgs(target)).toEqual([
      "compute",
      "ssh",
      "vm-1",
      "--zone=us-central1-a",
      "--project=test-project",
      "--quiet",
      "--command=bash -s",
    ]);
  });
});

describe("GcloudSshExecutor", () => {
  it("sends the script on stdin and resolves with stdout", async () => {
    const received: string[] = [];
    execFileMock.mockImplementation((_file, _args, _options, callback) => {
      setImmediate(() => callback(null, "EXPORT_IFACE=ens4\n", ""));
      return { stdin: collectingPipe(received) };
    });

    const out = await new GcloudSshExecutor({ gcloudPath: "/opt/gcloud" }).run(target, "echo hi\n");

    expect(out).toBe("EXPORT_IFACE=ens4\n");
    expect(received.join("")).toBe("echo hi\n");
    expect(execFileMock.mock.calls[0][0]).toBe("/opt/gcloud");
    expect(execFileMock.mock.calls[0][1]).toEqual(buildSshArgs(target));
  });

  it("rejects with the exit failure when gcloud quits before reading the script", async () => {
    execFileMock.mockImplementation((_file, _args, _options, callback) => {
      setImmediate(() =>
        callback(new Error("Command failed: gcloud compute ssh vm-1"), "", "ERROR: (gcloud.compute.ssh) permission denied\n"),
      );
      return { stdin: closedPipe() };
    });

    const error = await new GcloudSshExecutor().run(target, "echo hi\n").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemoteExecutionError);
    if (!(error instanceof RemoteExecutionError)) return;
    expect(error.message).toBe("ssh to vm-1 failed: Command failed: gcloud compute ssh vm-1");
    expect(error.instance).toBe("vm-1");
    expect(error.stderr).toBe("ERROR: (gcloud.compute.ssh) permission denied");
  });

  it("rejects when the script could not be sent even though gcloud exited cleanly", async () => {
    execFileMock.mockImplementation((_file, _args, _options, callback) => {
      setImmediate(() => callback(null, "", ""));
      return { stdin: closedPipe() };
    });

    await expect(new GcloudSshExecutor().run(target, "echo hi\n")).rejects.toThrow(
      "ssh to vm-1 failed: could not send script: write EPIPE",
    );
  });
});

describe("RemoteExecutionError", () => {
  it("keeps the instance and stderr", () => {
    const err = new RemoteExecutionError("ssh to vm-1 failed", "vm-1", "Permission denied");

    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("RemoteExecutionError");
    expect(err.instance).toBe("vm-1");
    expect(err.stderr).toBe("Permission denied");
  });
});
