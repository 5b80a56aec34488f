// Network reachability for strategies that need the cloud.
//
// DnsConnectivityMonitor resolves a host on an interval and caches the answer,
// so isConnected is a synchronous read on the request path.

import { lookup as dnsLookup } from "node:dns/promises";
import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import type { ConnectivityMonitor } from "./types.js";

/** Fixed answer; for deployments without a network check, and tests. */
export class StaticConnectivity implements ConnectivityMonitor {
  constructor(public isConnected = true) {}
}

export type LookupFn = (hostname: string) => Promise<unknown>;

export interface DnsConnectivityOptions {
  host: string;
  intervalMs?: number;
  lookup?: LookupFn;
  logger?: Logger;
}

export class DnsConnectivityMonitor implements ConnectivityMonitor {
  private connected = false;
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly host: string;
  private readonly intervalMs: number;
  private readonly lookup: LookupFn;
  private readonly logger: Logger;

  constructor(options: DnsConnectivityOptions) {
    this.host = options.host;
    this.intervalMs = options.intervalMs ?? 30_000;
    this.lookup = options.lookup ?? ((hostname) => dnsLookup(hostname));
    this.logger = options.logger ?? createConsoleLogger("Connectivity");
  }

  get isConnected(): boolean {
    return this.connected;
  }

  /** Resolve the host once and record the outcome. Never rejects. */
  async check(): Promise<boolean> {
    const previous = this.connected;
    try {
      await this.lookup(this.host);
      this.connected = true;
    } catch (err) {
      this.connected = false;
      if (previous) this.logger.warn(`Lost connectivity to ${this.host}: ${describeError(err)}`);
    }
    if (!previous && this.connected) this.logger.info(`Connectivity to ${this.host} established`);
    return this.connected;
  }

  /** Check now, then on every interval. The timer does not keep the process alive. */
  async start(): Promise<void> {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.check();
    }, this.intervalMs);
    this.timer.unref();
    await this.check();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
