import { ReconnectConfig } from "@/constants/transport";
import { scopedLog, type LogSink, type Logger } from "@/features/logging";
import { isConnected, type ConnectionState } from "@/features/models";
import { describeError } from "@/features/transport/errors";

export interface ReconnectorOptions {
  connect: () => Promise<void>;
  log: LogSink;
  /** Called once the attempt budget is spent. */
  onGiveUp?: (attempts: number) => void;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
}

/** Delay before the attempt following `attempt` earlier ones. */
export function reconnectDelay(
  attempt: number,
  baseDelayMs: number = ReconnectConfig.BASE_DELAY_MS,
  maxDelayMs: number = ReconnectConfig.MAX_DELAY_MS,
): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
}

/**
 * Re-establishes the link after it drops or a connect fails, with
 * exponential backoff. Fed the manager's connection states; does nothing
 * until `start()`.
 */
export class Reconnector {
  private readonly connect: () => Promise<void>;
  private readonly log: Logger;
  private readonly onGiveUp: ((attempts: number) => void) | null;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;

  private active = false;
  private attempting = false;
  private attempts = 0;
  private timeoutId: ReturnType<typeof setTimeout> | null = null;

  constructor(options: ReconnectorOptions) {
    this.connect = options.connect;
    this.log = scopedLog(options.log, "Reconnect");
    this.onGiveUp = options.onGiveUp ?? null;
    this.maxAttempts = options.maxAttempts ?? ReconnectConfig.MAX_ATTEMPTS;
    this.baseDelayMs = options.baseDelayMs ?? ReconnectConfig.BASE_DELAY_MS;
    this.maxDelayMs = options.maxDelayMs ?? ReconnectConfig.MAX_DELAY_MS;
  }

  get attemptCount(): number {
    return this.attempts;
  }

  get isPending(): boolean {
    return this.timeoutId !== null || this.attempting;
  }

  start(): void {
    this.active = true;
  }

  stop(): void {
    this.active = false;
    this.clearTimer();
    this.attempts = 0;
  }

  handleState(state: ConnectionState): void {
    if (isConnected(state)) {
      this.clearTimer();
      this.attempts = 0;
      return;
    }
    if (state.status === "connecting") return;
    if (!this.active || this.isPending) return;
    this.schedule();
  }

  private schedule(): void {
    if (this.attempts >= this.maxAttempts) {
      const attempts = this.attempts;
      this.log.error(`Auto-reconnect gave up after ${attempts} attempts`);
      this.active = false;
      this.attempts = 0;
      this.onGiveUp?.(attempts);
      return;
    }

    const delay = reconnectDelay(this.attempts, this.baseDelayMs, this.maxDelayMs);
    this.attempts++;
    this.log.info(`Auto-reconnect attempt ${this.attempts} in ${delay}ms`);
    this.timeoutId = setTimeout(() => {
      this.timeoutId = null;
      void this.attempt();
    }, delay);
  }

  private async attempt(): Promise<void> {
    if (!this.active) return;
    this.attempting = true;
    let failed = false;
    try {
      await this.connect();
      this.log.info("Auto-reconnect succeeded");
      this.attempts = 0;
    } catch (error) {
      failed = true;
      this.log.warn(`Auto-reconnect attempt ${this.attempts} failed: ${describeError(error)}`);
    } finally {
      this.attempting = false;
    }
    if (failed && this.active) this.schedule();
  }

  private clearTimer(): void {
    if (this.timeoutId) {
      clearTimeout(this.timeoutId);
      this.timeoutId = null;
    }
  }
}
