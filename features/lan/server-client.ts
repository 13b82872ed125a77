import { fetch, type Dispatcher } from "undici";
import { LanConfig } from "@/constants/transport";
import { scopedLog, type LogSink, type Logger } from "@/features/logging";
import { baseUrl, type ServerInfo } from "@/features/models";
import { describeError, isTransportError } from "@/features/transport/errors";
import { createPinnedAgent } from "./certificate-pinning";

export type HttpMethod = "GET" | "POST";

export interface ServerResponse {
  status: number;
  text: string;
}

export interface RequestOptions {
  /** JSON body; sets `Content-Type: application/json`. */
  body?: string;
  signal?: AbortSignal;
}

/** HTTP access to one relay server. */
export interface ServerClient {
  request(method: HttpMethod, path: string, options?: RequestOptions): Promise<ServerResponse>;
  close(): Promise<void>;
}

export interface HttpsServerClientOptions {
  server: ServerInfo;
  log: LogSink;
  /** Defaults to an agent pinned to `server.certFingerprint`. */
  dispatcher?: Dispatcher;
  timeoutMs?: number;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Errors from fetch wrap the real failure in `cause`; surface it so the log
 * line and the channel state say what actually went wrong.
 */
export function unwrapFetchError(error: unknown): Error {
  if (!(error instanceof Error)) return new Error(String(error));
  const cause: unknown = error.cause;
  if (isTransportError(cause)) return cause;
  if (cause instanceof Error) return new Error(`${error.message}: ${cause.message}`, { cause });
  return error;
}

export class HttpsServerClient implements ServerClient {
  private readonly baseUrl: string;
  private readonly dispatcher: Dispatcher;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(options: HttpsServerClientOptions) {
    this.baseUrl = baseUrl(options.server);
    this.dispatcher = options.dispatcher ?? createPinnedAgent(options.server.certFingerprint);
    this.timeoutMs = options.timeoutMs ?? LanConfig.REQUEST_TIMEOUT_MS;
    this.log = scopedLog(options.log, "HTTP");
  }

  async request(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {},
  ): Promise<ServerResponse> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;
    const start = Date.now();

    const res = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: options.body !== undefined ? { "Content-Type": "application/json" } : undefined,
      body: options.body,
      signal,
      dispatcher: this.dispatcher,
    }).catch((error: unknown) => {
      const failure = unwrapFetchError(error);
      this.log.debug(`${method} ${path} failed after ${Date.now() - start}ms: ${describeError(failure)}`);
      throw failure;
    });

    const text = await res.text();
    this.log.debug(`${method} ${path} ${res.status} after ${Date.now() - start}ms`);
    return { status: res.status, text };
  }

  close(): Promise<void> {
    return this.dispatcher.close();
  }
}
