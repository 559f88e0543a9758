import { connect as netConnect, type Socket } from "node:net";
import type { Duplex, Readable, Writable } from "node:stream";

import { StreamMessageReader, StreamMessageWriter } from "vscode-jsonrpc/node.js";

import { TransportError } from "../errors.js";
import { armDeadline } from "../runtime/timers.js";
import type { JsonRpcMessage } from "./messages.js";

/** Framing applied to the byte streams. */
export type FramingMode = "header" | "line";

/** Options shared by both framings. */
export interface ChannelOptions {
  /**
   * Transport the channel takes ownership of, typically the socket both
   * streams belong to. It is destroyed when the channel is disposed.
   */
  readonly owned?: Duplex;
}

/**
 * Bidirectional message pipe over a pair of byte streams. Decoding failures
 * are reported through `onError` and do not close the channel; `onClose`
 * fires once when the inbound side ends.
 */
export interface MessageChannel {
  write(message: JsonRpcMessage): Promise<void>;
  onMessage(listener: (message: unknown) => void): void;
  onError(listener: (error: Error) => void): void;
  onClose(listener: () => void): void;
  dispose(): void;
}

abstract class BaseChannel implements MessageChannel {
  private readonly messageListeners: Array<(message: unknown) => void> = [];
  private readonly errorListeners: Array<(error: Error) => void> = [];
  private readonly closeListeners: Array<() => void> = [];
  protected disposed = false;
  private closed = false;
  private readonly owned: Duplex | null;

  constructor(options: ChannelOptions) {
    this.owned = options.owned ?? null;
    // Stays attached past dispose so a late reset is never an unhandled 'error'.
    this.owned?.on("error", this.handleOwnedError);
  }

  abstract write(message: JsonRpcMessage): Promise<void>;
  abstract dispose(): void;

  onMessage(listener: (message: unknown) => void): void {
    this.messageListeners.push(listener);
  }

  onError(listener: (error: Error) => void): void {
    this.errorListeners.push(listener);
  }

  onClose(listener: () => void): void {
    this.closeListeners.push(listener);
  }

  protected emitMessage(message: unknown): void {
    if (this.disposed) {
      return;
    }
    for (const listener of this.messageListeners) {
      listener(message);
    }
  }

  protected emitError(error: Error): void {
    for (const listener of this.errorListeners) {
      listener(error);
    }
  }

  /** Destroys the owned transport so the peer observes the close. */
  protected releaseOwned(): void {
    if (this.owned && !this.owned.destroyed) {
      this.owned.destroy();
    }
  }

  // The framing readers report transport errors while attached; after dispose there is nobody left to tell.
  private readonly handleOwnedError = (): void => {};

  protected emitClose(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const listener of this.closeListeners) {
      listener();
    }
  }
}

/** `Content-Length` framed channel backed by vscode-jsonrpc's stream reader and writer. */
export class HeaderFramedChannel extends BaseChannel {
  private readonly reader: StreamMessageReader;
  private readonly writer: StreamMessageWriter;
  private readonly subscription: { dispose(): void };

  constructor(readable: Readable, writable: Writable, options: ChannelOptions = {}) {
    super(options);
    this.reader = new StreamMessageReader(readable);
    this.writer = new StreamMessageWriter(writable);
    this.reader.onError((error) => this.emitError(error));
    this.reader.onClose(() => this.emitClose());
    this.writer.onError(([error]) => this.emitError(error));
    this.subscription = this.reader.listen((message) => this.emitMessage(message));
  }

  async write(message: JsonRpcMessage): Promise<void> {
    if (this.disposed) {
      throw new TransportError("Cannot write to a disposed channel");
    }
    await this.writer.write(message);
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.subscription.dispose();
    this.reader.dispose();
    this.writer.dispose();
    this.releaseOwned();
    this.emitClose();
  }
}

/** Newline-delimited JSON channel: one message per line in both directions. */
export class LineFramedChannel extends BaseChannel {
  private buffer = "";

  constructor(
    private readonly readable: Readable,
    private readonly writable: Writable,
    options: ChannelOptions = {},
  ) {
    super(options);
    readable.setEncoding("utf8");
    readable.on("data", this.handleData);
    readable.on("error", this.handleStreamError);
    readable.on("end", this.handleEnd);
    readable.on("close", this.handleEnd);
  }

  async write(message: JsonRpcMessage): Promise<void> {
    if (this.disposed || this.writable.destroyed) {
      throw new TransportError("Cannot write to a closed channel");
    }
    const line = `${JSON.stringify(message)}\n`;
    const stream = this.writable;

    await new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        stream.off("error", onError);
        stream.off("drain", onDrain);
      };
      const onError = (err: Error) => {
        cleanup();
        reject(new TransportError(`Failed to write message: ${err.message}`, err));
      };
      const onDrain = () => {
        cleanup();
        resolve();
      };

      stream.once("error", onError);
      const wrote = stream.write(line, (err) => {
        if (err) {
          cleanup();
          reject(new TransportError(`Failed to write message: ${err.message}`, err));
        } else if (wrote) {
          cleanup();
          resolve();
        }
      });
      if (!wrote) {
        stream.once("drain", onDrain);
      }
    });
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.readable.off("data", this.handleData);
    this.readable.off("error", this.handleStreamError);
    this.readable.off("end", this.handleEnd);
    this.readable.off("close", this.handleEnd);
    this.releaseOwned();
    this.emitClose();
  }

  private readonly handleData = (chunk: string | Buffer): void => {
    this.buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
    let newlineIndex = this.buffer.indexOf("\n");
    while (newlineIndex !== -1) {
      const rawLine = this.buffer.slice(0, newlineIndex);
      this.buffer = this.buffer.slice(newlineIndex + 1);
      this.handleLine(rawLine);
      newlineIndex = this.buffer.indexOf("\n");
    }
  };

  private handleLine(rawLine: string): void {
    const cleaned = rawLine.replace(/\r$/, "");
    if (!cleaned.trim()) {
      return;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(cleaned);
    } catch (error) {
      this.emitError(new TransportError(`Malformed frame: ${error instanceof Error ? error.message : String(error)}`, error));
      return;
    }
    this.emitMessage(parsed);
  }

  private readonly handleStreamError = (error: Error): void => {
    this.emitError(new TransportError(`Stream error: ${error.message}`, error));
  };

  private readonly handleEnd = (): void => {
    if (this.buffer.trim().length > 0) {
      this.handleLine(this.buffer);
    }
    this.buffer = "";
    this.emitClose();
  };
}

/** Builds the channel matching `mode` over the given streams. */
export function createMessageChannel(
  mode: FramingMode,
  readable: Readable,
  writable: Writable,
  options: ChannelOptions = {},
): MessageChannel {
  return mode === "line"
    ? new LineFramedChannel(readable, writable, options)
    : new HeaderFramedChannel(readable, writable, options);
}

/**
 * Opens a TCP connection to `host:port`, rejecting with a
 * {@link TransportError} when it cannot be established within `timeoutMs`.
 */
export function connectSocket(host: string, port: number, timeoutMs: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = netConnect({ host, port });
    const disarm = armDeadline(timeoutMs, () => {
      socket.destroy();
      reject(new TransportError(`Timed out after ${timeoutMs}ms connecting to ${host}:${port}`));
    });
    socket.once("connect", () => {
      disarm();
      socket.off("error", onError);
      resolve(socket);
    });
    const onError = (error: Error) => {
      disarm();
      reject(new TransportError(`Failed to connect to ${host}:${port}: ${error.message}`, error));
    };
    socket.once("error", onError);
  });
}
