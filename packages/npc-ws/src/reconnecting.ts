// Auto-reconnecting WebSocket client for NPC engines.
//
// Keeps an engine connected to a WebSocket server: reconnects with
// exponential backoff and reports connection state. Every drop disconnects
// the engine, so calls in flight fail with "disconnected" instead of waiting
// for a connection that may never come back.

import WebSocket from "ws";
import { type Endpoint, logger } from "@npc-rpc/core";

import { type WebSocketLike, attachWebSocket } from "./transport.ts";

const log = logger("ws");

/** Connection state. */
export type ConnectionState = "disconnected" | "connecting" | "connected" | "reconnecting";

/** Backoff configuration for reconnection attempts. */
export interface BackoffConfig {
  /** Initial delay in milliseconds. Default: 1000 */
  initial: number;
  /** Maximum delay in milliseconds. Default: 30000 */
  max: number;
  /** Multiplier for exponential backoff. Default: 2 */
  factor: number;
  /** Jitter factor (0-1) to randomize delays. Default: 0.1 */
  jitter: number;
}

/** Configuration for the reconnecting client. */
export interface ReconnectingClientConfig {
  /** WebSocket URL to connect to. */
  url: string;

  /** Reconnection configuration. */
  reconnect?: {
    /** Whether reconnection is enabled. Default: true */
    enabled?: boolean;
    /** Maximum number of reconnection attempts. Default: Infinity */
    maxAttempts?: number;
    /** Backoff configuration. */
    backoff?: Partial<BackoffConfig>;
  };

  /** Called when connection state changes. */
  onStateChange?: (state: ConnectionState) => void;

  /** Called when a reconnection attempt is scheduled. */
  onReconnectAttempt?: (attempt: number, delay: number) => void;

  /** Called when reconnection fails permanently. */
  onReconnectFailed?: (error: ReconnectFailedError) => void;

  /** Opens a socket. Default: a `ws` WebSocket. */
  createSocket?: (url: string) => WebSocketLike;
}

/** Error thrown when client is permanently closed. */
export class ClientClosedError extends Error {
  constructor() {
    super("Client is closed");
    this.name = "ClientClosedError";
  }
}

/** Error thrown when reconnection fails. */
export class ReconnectFailedError extends Error {
  constructor(
    public attempts: number,
    public lastError: Error,
  ) {
    super(`Reconnection failed after ${attempts} attempts: ${lastError.message}`);
    this.name = "ReconnectFailedError";
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function defaultCreateSocket(url: string): WebSocketLike {
  return new WebSocket(url);
}

/**
 * Auto-reconnecting WebSocket client.
 *
 * The engine is connected while the socket is open. Calls made while the
 * client is (re)connecting are dropped by the engine and complete through
 * their own timeout; the client does not queue them.
 */
export class ReconnectingWsClient {
  private url: string;
  private config: {
    reconnect: {
      enabled: boolean;
      maxAttempts: number;
      backoff: BackoffConfig;
    };
  };

  private onStateChange?: (state: ConnectionState) => void;
  private onReconnectAttempt?: (attempt: number, delay: number) => void;
  private onReconnectFailed?: (error: ReconnectFailedError) => void;
  private createSocket: (url: string) => WebSocketLike;

  private state: ConnectionState = "disconnected";
  private ws: WebSocketLike | null = null;
  private pendingWs: WebSocketLike | null = null; // WebSocket being connected
  private detach: ((reason?: unknown) => void) | null = null;
  private closed = false;
  private reconnectAttempts = 0;
  private connectPromise: Promise<void> | null = null;
  private cancelSleep: (() => void) | null = null;

  constructor(
    private readonly npc: Endpoint,
    config: ReconnectingClientConfig,
  ) {
    this.url = config.url;
    this.onStateChange = config.onStateChange;
    this.onReconnectAttempt = config.onReconnectAttempt;
    this.onReconnectFailed = config.onReconnectFailed;
    this.createSocket = config.createSocket ?? defaultCreateSocket;

    const backoff = config.reconnect?.backoff ?? {};
    this.config = {
      reconnect: {
        enabled: config.reconnect?.enabled ?? true,
        maxAttempts: config.reconnect?.maxAttempts ?? Infinity,
        backoff: {
          initial: backoff.initial ?? 1000,
          max: backoff.max ?? 30000,
          factor: backoff.factor ?? 2,
          jitter: backoff.jitter ?? 0.1,
        },
      },
    };
  }

  /** Get the current connection state. */
  getState(): ConnectionState {
    return this.state;
  }

  /** Check if the client has been permanently closed. */
  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Connect to the server.
   *
   * Resolves once the engine is connected. With reconnection enabled a
   * failed attempt is retried with backoff; the promise rejects with
   * `ReconnectFailedError` when attempts run out, or `ClientClosedError`
   * when the client is closed first.
   */
  connect(): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ClientClosedError());
    }

    if (this.state === "connected") {
      return Promise.resolve();
    }

    // If already connecting, wait for that attempt
    return this.connectPromise ?? this.run(() => this.doConnect());
  }

  private run(task: () => Promise<void>): Promise<void> {
    const promise = task().finally(() => {
      if (this.connectPromise === promise) this.connectPromise = null;
    });
    this.connectPromise = promise;
    return promise;
  }

  private async doConnect(): Promise<void> {
    this.setState(this.reconnectAttempts > 0 ? "reconnecting" : "connecting");

    let ws: WebSocketLike;
    try {
      ws = await this.openSocket();
    } catch (error) {
      if (this.closed) throw new ClientClosedError();
      if (!this.config.reconnect.enabled) {
        this.setState("disconnected");
        throw toError(error);
      }
      await this.scheduleReconnect(toError(error));
      return;
    }

    // Check if closed while waiting
    if (this.closed) {
      ws.close();
      throw new ClientClosedError();
    }

    this.ws = ws;
    this.detach = attachWebSocket(this.npc, ws);
    this.reconnectAttempts = 0;
    this.setState("connected");

    // Registered after attachWebSocket, so the engine is already
    // disconnected when this runs.
    this.setupDisconnectHandler(ws);
  }

  private openSocket(): Promise<WebSocketLike> {
    return new Promise((resolve, reject) => {
      const ws = this.createSocket(this.url);
      this.pendingWs = ws;

      const settle = () => {
        ws.removeEventListener("open", onOpen);
        ws.removeEventListener("error", onError);
        ws.removeEventListener("close", onError);
        if (this.pendingWs === ws) this.pendingWs = null;
      };
      const onOpen = () => {
        settle();
        resolve(ws);
      };
      const onError = () => {
        settle();
        reject(new Error(`Failed to connect to ${this.url}`));
      };
      ws.addEventListener("open", onOpen);
      ws.addEventListener("error", onError);
      ws.addEventListener("close", onError);
    });
  }

  private setupDisconnectHandler(ws: WebSocketLike): void {
    const handleDisconnect = () => {
      if (this.ws !== ws) return; // Stale handler

      this.ws = null;
      this.detach = null;

      if (this.closed) {
        this.setState("disconnected");
        return;
      }

      if (this.config.reconnect.enabled) {
        this.setState("reconnecting");
        this.run(() => this.scheduleReconnect(new Error("Connection lost"))).catch(
          (e: unknown) => {
            log("reconnection stopped: %O", e);
          },
        );
      } else {
        this.setState("disconnected");
      }
    };

    ws.addEventListener("close", handleDisconnect);
    ws.addEventListener("error", handleDisconnect);
  }

  private async scheduleReconnect(lastError: Error): Promise<void> {
    this.reconnectAttempts++;

    if (this.reconnectAttempts > this.config.reconnect.maxAttempts) {
      const error = new ReconnectFailedError(this.reconnectAttempts - 1, lastError);
      this.reconnectAttempts = 0;
      this.setState("disconnected");
      this.onReconnectFailed?.(error);
      throw error;
    }

    this.setState("reconnecting");
    const delay = this.calculateBackoff();
    log("reconnect attempt %d in %dms (%s)", this.reconnectAttempts, delay, lastError.message);
    this.onReconnectAttempt?.(this.reconnectAttempts, delay);

    await this.sleep(delay);

    if (this.closed) throw new ClientClosedError();

    await this.doConnect();
  }

  private calculateBackoff(): number {
    const { initial, max, factor, jitter } = this.config.reconnect.backoff;
    const base = Math.min(initial * Math.pow(factor, this.reconnectAttempts - 1), max);
    const jitterAmount = base * jitter * (Math.random() * 2 - 1);
    return Math.max(0, Math.floor(base + jitterAmount));
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.cancelSleep = null;
        resolve();
      }, ms);
      this.cancelSleep = () => {
        clearTimeout(timer);
        this.cancelSleep = null;
        resolve();
      };
    });
  }

  private setState(state: ConnectionState): void {
    if (this.state !== state) {
      this.state = state;
      this.onStateChange?.(state);
    }
  }

  /**
   * Close the client permanently.
   *
   * Stops reconnection attempts, closes the socket and disconnects the
   * engine, failing its pending calls with "disconnected".
   */
  close(): void {
    if (this.closed) return;

    this.closed = true;
    this.cancelSleep?.();

    // Close any pending WebSocket (still connecting)
    if (this.pendingWs) {
      this.pendingWs.close();
      this.pendingWs = null;
    }

    // Close established WebSocket
    this.detach?.();
    this.detach = null;
    if (this.ws) {
      this.ws.close();
      this.ws = null;
    }
    this.setState("disconnected");
  }
}

/**
 * Create a reconnecting WebSocket client.
 *
 * @example
 * ```typescript
 * const npc = new Npc({ name: "client" });
 * const client = createReconnectingClient(npc, {
 *   url: "ws://localhost:8080/npc",
 *   reconnect: {
 *     enabled: true,
 *     maxAttempts: 10,
 *     backoff: { initial: 1000, max: 30000, factor: 2 },
 *   },
 *   onStateChange: (state) => console.log("Connection:", state),
 * });
 *
 * await client.connect();
 * npc.deliver("download", { file: "a.txt" }, 5000, (param, error) => { ... });
 * ```
 */
export function createReconnectingClient(
  npc: Endpoint,
  config: ReconnectingClientConfig,
): ReconnectingWsClient {
  return new ReconnectingWsClient(npc, config);
}
