import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';

export interface PingResult {
  url: string;
  status: number | null;
  error?: string;
}

/**
 * Keeps free-tier hosts awake by pinging the app's own public URL.
 *
 * Render-style platforms sleep an instance after ~15 minutes without
 * inbound traffic; a sleeping instance misses webhook deliveries until
 * the first retry wakes it. Disabled unless KEEP_ALIVE_URL is set.
 */
@Injectable()
export class KeepAliveService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(KeepAliveService.name);
  private readonly baseUrl: string | null;
  private readonly intervalMs: number;
  private readonly timeoutMs = 10_000;
  private timer: NodeJS.Timeout | null = null;

  constructor(config: ConfigService) {
    const url = config.get<string>('KEEP_ALIVE_URL');
    this.baseUrl = url ? url.replace(/\/+$/, '') : null;
    this.intervalMs = config.get<number>('KEEP_ALIVE_INTERVAL_MS') ?? 240_000;
  }

  onModuleInit(): void {
    if (!this.baseUrl) {
      this.logger.debug('KEEP_ALIVE_URL not set, keep-alive disabled');
      return;
    }

    this.timer = setInterval(() => {
      void this.pingAll();
    }, this.intervalMs);
    this.timer.unref();
    this.logger.log(`Keep-alive started for ${this.baseUrl}`);
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  getTargets(): string[] {
    if (!this.baseUrl) return [];
    return [`${this.baseUrl}/`, `${this.baseUrl}/ping`];
  }

  /**
   * Pings every target in turn. Never throws.
   */
  async pingAll(): Promise<PingResult[]> {
    const results: PingResult[] = [];
    for (const url of this.getTargets()) {
      results.push(await this.ping(url));
    }
    return results;
  }

  private async ping(url: string): Promise<PingResult> {
    try {
      const response = await axios.get(url, {
        timeout: this.timeoutMs,
        validateStatus: () => true,
      });
      this.logger.log(`Pinged ${url} - Status: ${response.status}`);
      return { url, status: response.status };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Ping failed for ${url}: ${message}`);
      return { url, status: null, error: message };
    }
  }
}
