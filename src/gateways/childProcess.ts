/**
 * Gateway spawning the agent server. It validates the command line, builds
 * the child environment and pins the stdio layout so the supervisor talks to
 * a predictable process handle. Tests inject `spawnImpl` to observe the
 * wiring without launching anything.
 */
import { spawn as nodeSpawn, type SpawnOptionsWithoutStdio } from "node:child_process";
import type { EventEmitter } from "node:events";
import type { Readable, Writable } from "node:stream";

import type { ProcessEnv } from "../nodePrimitives.js";

export interface SpawnServerProcessOptions {
  /** Executable name or absolute path. Must not be empty. */
  readonly command: string;
  readonly args?: readonly string[];
  readonly cwd?: string;
  /** Environment inherited by the child (defaults to {@link process.env}). */
  readonly inheritEnv?: ProcessEnv;
  /** Overrides applied after inheritance; `undefined` removes a key. */
  readonly extraEnv?: Readonly<Record<string, string | undefined>>;
  /** Keys stripped from the inherited environment. */
  readonly removeEnvKeys?: readonly string[];
}

/**
 * Part of a spawned child the supervisor relies on. Node's
 * `ChildProcessWithoutNullStreams` satisfies it.
 */
export interface ServerChild extends EventEmitter {
  readonly pid?: number | undefined;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

/** Narrow spawn signature the gateway depends on. */
export type SpawnImpl = (command: string, args: readonly string[], options: SpawnOptionsWithoutStdio) => ServerChild;

export class InvalidServerCommandError extends Error {
  constructor(command: string) {
    super(`Server command must be a non-empty string. Received: "${command}".`);
    this.name = "InvalidServerCommandError";
  }
}

export class InvalidServerArgumentError extends TypeError {
  constructor(value: unknown, index: number) {
    super(`Server arguments must be strings without NUL bytes. Argument at index ${index} is invalid (${typeof value}).`);
    this.name = "InvalidServerArgumentError";
  }
}

export interface ChildProcessGateway {
  spawn(options: SpawnServerProcessOptions): ServerChild;
}

interface ChildProcessGatewayDeps {
  readonly spawnImpl?: SpawnImpl;
}

export function createChildProcessGateway({ spawnImpl = nodeSpawn }: ChildProcessGatewayDeps = {}): ChildProcessGateway {
  return {
    spawn(options: SpawnServerProcessOptions): ServerChild {
      const command = options.command;
      if (typeof command !== "string" || command.trim().length === 0) {
        throw new InvalidServerCommandError(command);
      }
      const args = normaliseArgs(options.args);
      const env = buildChildEnv(options);

      // All three streams stay piped and no console window is attached, so
      // the child never inherits the host terminal.
      return spawnImpl(command, args, {
        ...(options.cwd !== undefined ? { cwd: options.cwd } : {}),
        env,
        stdio: "pipe",
        shell: false,
        windowsHide: true,
        windowsVerbatimArguments: false,
      });
    },
  };
}

function normaliseArgs(args: SpawnServerProcessOptions["args"]): readonly string[] {
  if (args === undefined) {
    return [];
  }
  return args.map((value, index) => {
    if (typeof value !== "string" || value.includes("\u0000")) {
      throw new InvalidServerArgumentError(value, index);
    }
    return value;
  });
}

/** Inherited environment minus `removeEnvKeys`, with `extraEnv` applied last. */
export function buildChildEnv({
  inheritEnv = process.env,
  extraEnv = {},
  removeEnvKeys = [],
}: Pick<SpawnServerProcessOptions, "inheritEnv" | "extraEnv" | "removeEnvKeys">): ProcessEnv {
  const env: ProcessEnv = { ...inheritEnv };
  for (const key of removeEnvKeys) {
    delete env[key];
  }
  for (const [key, value] of Object.entries(extraEnv)) {
    if (value === undefined) {
      delete env[key];
    } else {
      env[key] = value;
    }
  }
  return env;
}
