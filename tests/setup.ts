/**
 * Mocha bootstrap keeping the suite hermetic: `net` connections to anything
 * but a loopback host, and every `tls` or `fetch` attempt, throw
 * `E-NETWORK-BLOCKED`. The TCP transport tests talk to servers listening on
 * 127.0.0.1. Originals are restored once the run finishes.
 */
import { after } from "mocha";
import { Socket } from "node:net";
import { TLSSocket } from "node:tls";

type RestoreHook = () => void;

const restores: RestoreHook[] = [];

/** Message carried by the errors thrown for blocked connections. */
export function blockedMessage(primitive: string): string {
  return `network access via ${primitive} is disabled during tests`;
}

function blocked(primitive: string): Error {
  return Object.assign(new Error(blockedMessage(primitive)), { code: "E-NETWORK-BLOCKED" });
}

const LOOPBACK_HOSTS = new Set(["127.0.0.1", "::1", "localhost"]);

/**
 * Host targeted by a `Socket#connect` call. `net.connect()` forwards its
 * arguments already normalised into an `[options, listener]` array. Unix
 * socket paths yield `null`.
 */
export function connectTarget(args: readonly unknown[]): string | null {
  let first = args[0];
  if (Array.isArray(first)) {
    first = first[0];
  }
  if (typeof first === "number") {
    return typeof args[1] === "string" ? args[1] : "localhost";
  }
  if (first && typeof first === "object") {
    if ("path" in first && first.path !== undefined) {
      return null;
    }
    return "host" in first && typeof first.host === "string" ? first.host : "localhost";
  }
  return null;
}

export function isLoopbackTarget(args: readonly unknown[]): boolean {
  const host = connectTarget(args);
  return host !== null && LOOPBACK_HOSTS.has(host.replace(/^\[|\]$/g, "").toLowerCase());
}

function installNetworkGuards(): void {
  const originalSocketConnect = Socket.prototype.connect;
  Socket.prototype.connect = function guardedSocketConnect(this: Socket, ...args: unknown[]): Socket {
    if (!isLoopbackTarget(args)) {
      throw blocked("net.Socket#connect");
    }
    const socket: Socket = Reflect.apply(originalSocketConnect, this, args);
    return socket;
  };
  restores.push(() => {
    Socket.prototype.connect = originalSocketConnect;
  });

  const originalTlsConnect = TLSSocket.prototype.connect;
  TLSSocket.prototype.connect = function blockedTlsConnect(): never {
    throw blocked("tls.TLSSocket#connect");
  };
  restores.push(() => {
    TLSSocket.prototype.connect = originalTlsConnect;
  });

  if (typeof globalThis.fetch === "function") {
    const originalFetch = globalThis.fetch;
    globalThis.fetch = async (): Promise<never> => {
      throw blocked("fetch");
    };
    restores.push(() => {
      globalThis.fetch = originalFetch;
    });
  }
}

installNetworkGuards();

after(() => {
  while (restores.length > 0) {
    restores.pop()?.();
  }
});
