import { spawn, type ChildProcessByStdio } from "node:child_process";
import readline from "node:readline";
import type { Readable } from "node:stream";
import type { FastifyBaseLogger } from "fastify";
import { StartupFailureError } from "../errors.js";

const BUILD_DIR_MARKER = "BUILD_DIR = ";

/** Exit code reported when the process ended without one (killed by a signal). */
export const UNKNOWN_EXIT_CODE = -1;

export interface ProcessOutcome {
  success: boolean;
  exitCode: number;
  /** Every line from both streams, in the order they were read. */
  logs: string[];
  /** Last `BUILD_DIR = …` value seen in the output, if any. */
  artifactDir: string | null;
}

export interface RunProcessOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Aborting kills the child with SIGTERM. */
  signal?: AbortSignal;
  log?: FastifyBaseLogger;
}

export type LineSink = (line: string) => void;

export type ProcessRunner = (
  command: string,
  args: string[],
  onLine: LineSink,
  options?: RunProcessOptions,
) => Promise<ProcessOutcome>;

/** Pull the artifact directory out of a `BUILD_DIR = …` line. */
export function parseBuildDir(line: string): string | null {
  const at = line.indexOf(BUILD_DIR_MARKER);
  if (at === -1) return null;
  const dir = line.slice(at + BUILD_DIR_MARKER.length).trim();
  return dir.length > 0 ? dir : null;
}

/** A spawned child whose stdout and stderr are pipes. */
export type PipedChild = ChildProcessByStdio<null, Readable, Readable>;

/**
 * Follow an already spawned child: forward every line to `onLine` as it
 * arrives and resolve once the process has exited and both streams are
 * drained. Must be called in the same tick as `spawn()`.
 */
export function collectOutput(
  child: PipedChild,
  command: string,
  onLine: LineSink,
  log?: FastifyBaseLogger,
): Promise<ProcessOutcome> {
  return new Promise<ProcessOutcome>((resolve, reject) => {
    const logs: string[] = [];
    let artifactDir: string | null = null;
    let spawned = false;

    const drain = (stream: Readable, name: "stdout" | "stderr") => {
      const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
      lines.on("line", (line) => {
        const dir = parseBuildDir(line);
        if (dir) artifactDir = dir;
        onLine(line);
        logs.push(line);
      });
      // readline re-emits read errors here. They end this stream's drain
      // only; the other stream and the exit status are unaffected.
      lines.on("error", (err) => {
        log?.warn({ err, stream: name }, `Error reading ${name}`);
      });
    };

    drain(child.stdout, "stdout");
    drain(child.stderr, "stderr");

    child.once("spawn", () => {
      spawned = true;
    });

    child.on("error", (err) => {
      if (!spawned) {
        reject(new StartupFailureError(command, err));
        return;
      }
      log?.warn({ err, pid: child.pid }, `${command} process error`);
    });

    // "close" fires after the process exited and both stdio streams closed.
    child.once("close", (code, signal) => {
      if (!spawned) return;
      const exitCode = code ?? UNKNOWN_EXIT_CODE;
      log?.info({ command, exitCode, signal }, `${command} exited`);
      resolve({ success: code === 0, exitCode, logs, artifactDir });
    });
  });
}

/**
 * Spawn `command` with both output streams piped and collect its output.
 * Rejects with StartupFailureError when the process cannot be started at
 * all.
 */
export const runProcess: ProcessRunner = (command, args, onLine, options = {}) => {
  const { log } = options;
  log?.info({ command, args }, `Running: ${command} ${args.join(" ")}`);

  const child = spawn(command, args, {
    cwd: options.cwd,
    env: options.env,
    signal: options.signal,
    killSignal: "SIGTERM",
    stdio: ["ignore", "pipe", "pipe"],
  });
  return collectOutput(child, command, onLine, log);
};
