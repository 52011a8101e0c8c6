// ssh.ts
import net from "node:net";
import execa from "execa";
import { render, type Command } from "./command";

export type RunResult = { stdout: string; stderr: string };

export type RunOptions = {
  timeoutMs?: number; // total process timeout
};

/** Where bootstrap commands go. SshRunner in production, an in-memory fake in tests. */
export interface RemoteRunner {
  /** Runs to completion; throws on non-zero exit. */
  run(host: string, cmd: Command, opts?: RunOptions): Promise<RunResult>;
  /** Exit status 0 → true; any other exit → false. Transport failures still throw. */
  succeeds(host: string, cmd: Command, opts?: RunOptions): Promise<boolean>;
  waitUntilReachable(host: string, timeoutMs?: number): Promise<void>;
}

export type SSHOpts = {
  user: string;
  key: string;
  timeoutMs?: number;
};

// ssh's own exit status when the connection itself fails
const SSH_TRANSPORT_FAILURE = 255;

function baseSshArgs(host: string, { user, key }: SSHOpts): string[] {
  if (host.includes("@")) throw new Error(`host must not contain '@': ${host}`);
  return [
    "-i",
    key,
    "-o",
    "StrictHostKeyChecking=no",
    "-o",
    "UserKnownHostsFile=/dev/null",
    "-o",
    "BatchMode=yes",
    "-o",
    "ConnectTimeout=10",
    "-o",
    "LogLevel=ERROR",
    `${user}@${host}`,
  ];
}

export class SshRunner implements RemoteRunner {
  constructor(private readonly opts: SSHOpts) {}

  async run(host: string, cmd: Command, opts: RunOptions = {}): Promise<RunResult> {
    const { stdout, stderr } = await execa("ssh", [...baseSshArgs(host, this.opts), render(cmd)], {
      input: cmd.stdin,
      timeout: opts.timeoutMs ?? this.opts.timeoutMs ?? 120_000,
    });
    if (stderr.trim()) console.warn(`[ssh:${host}] ${stderr.trim()}`);
    return { stdout, stderr };
  }

  async succeeds(host: string, cmd: Command, opts: RunOptions = {}): Promise<boolean> {
    const result = await execa("ssh", [...baseSshArgs(host, this.opts), render(cmd)], {
      input: cmd.stdin,
      timeout: opts.timeoutMs ?? 60_000,
      reject: false,
    });
    if (result.timedOut || result.exitCode === SSH_TRANSPORT_FAILURE) {
      throw new Error(`ssh to ${host} failed: ${result.stderr.trim() || `exit ${result.exitCode}`}`);
    }
    return result.exitCode === 0;
  }

  /**
   * Wait until SSH is usable: port 22 is open AND a trivial remote command succeeds.
   * Retries with backoff up to timeoutMs (default 5 min).
   */
  async waitUntilReachable(host: string, timeoutMs = 5 * 60_000): Promise<void> {
    const start = Date.now();
    let attempt = 0;
    let last: unknown = null;
    while (Date.now() - start < timeoutMs) {
      attempt++;
      try {
        await portOpen(host);
        await this.run(host, { program: "true", args: [] }, { timeoutMs: 10_000 });
        return;
      } catch (err) {
        last = err;
        const delay = Math.min(2000 * attempt, 8000);
        await new Promise((r) => setTimeout(r, delay));
      }
    }
    throw new Error(`waitForSSH timed out for ${this.opts.user}@${host} after ${timeoutMs}ms`, {
      cause: last,
    });
  }
}

function portOpen(host: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const socket = new net.Socket();
    socket.setTimeout(5_000);
    socket.once("error", (err) => {
      socket.destroy();
      reject(err);
    });
    socket.once("timeout", () => {
      socket.destroy();
      reject(new Error("port 22 timeout"));
    });
    socket.connect(22, host, () => {
      socket.end();
      resolve();
    });
  });
}
