import * as http from 'node:http';
import * as https from 'node:https';
import { isIP, type LookupFunction } from 'node:net';
import { performance } from 'node:perf_hooks';
import type { ProbeConfig } from '@ces/config';
import {
  BodyMismatchError,
  createChildLogger,
  LatencyRecord,
  type LoggerPort,
  type ProbePort,
  type ProbeTarget,
  ProbeNetworkError,
  toError,
} from '@ces/domain';
import axios, { type AxiosInstance } from 'axios';
import { SocksProxyAgent } from 'socks-proxy-agent';

const defaultLog = createChildLogger('latency-probe');

/** How a leg reaches its URL. */
export type LegRoute =
  | { kind: 'direct' }
  | { kind: 'socks'; proxyUrl: string }
  /** Connects to `address` whatever the URL host resolves to; Host and SNI stay untouched. */
  | { kind: 'pinned'; address: string };

export interface LegRequest {
  url: string;
  expectedBody: string;
  timeoutMs: number;
  route: LegRoute;
}

/** Resolves the round-trip time in ms, or rejects with a ProbeNetworkError / BodyMismatchError. */
export type LegRequester = (request: LegRequest) => Promise<number>;

const scannerClient = axios.create({
  proxy: false,
  responseType: 'text',
  validateStatus: () => true,
  headers: { accept: '*/*' },
});

export function createAxiosLegRequester(client: AxiosInstance = scannerClient): LegRequester {
  return async ({ url, expectedBody, timeoutMs, route }) => {
    const agents = createAgents(route);
    const startedAt = performance.now();
    let body: string;

    try {
      const response = await client.get<string>(url, {
        signal: AbortSignal.timeout(timeoutMs),
        httpAgent: agents?.http,
        httpsAgent: agents?.https,
      });
      body = typeof response.data === 'string' ? response.data : String(response.data);
    } catch (error) {
      throw new ProbeNetworkError(url, axios.isCancel(error), { cause: error });
    } finally {
      agents?.http.destroy();
      agents?.https.destroy();
    }

    const elapsedMs = Math.round(performance.now() - startedAt);
    if (!body.includes(expectedBody)) {
      throw new BodyMismatchError(url, expectedBody, body);
    }
    return elapsedMs;
  };
}

function createAgents(route: LegRoute): { http: http.Agent; https: http.Agent } | undefined {
  switch (route.kind) {
    case 'direct':
      return undefined;
    case 'socks': {
      const agent = new SocksProxyAgent(route.proxyUrl);
      return { http: agent, https: agent };
    }
    case 'pinned': {
      const lookup = pinnedLookup(route.address);
      return { http: new http.Agent({ lookup }), https: new https.Agent({ lookup }) };
    }
  }
}

/**
 * DNS override answering every lookup with `address`. Node 20 asks for all
 * addresses when `autoSelectFamily` is on, so both callback shapes are served.
 */
export function pinnedLookup(address: string): LookupFunction {
  const family = isIP(address) === 6 ? 6 : 4;
  return (_hostname, options, callback) => {
    if (options.all) {
      callback(null, [{ address, family }]);
    } else {
      callback(null, address, family);
    }
  };
}

/** Formats an address for the host part of a URL. */
export function urlHost(address: string): string {
  return isIP(address) === 6 ? `[${address}]` : address;
}

export interface LatencyProbeOptions {
  ignoreBodyWarning?: boolean;
  requestLeg?: LegRequester;
  log?: Pick<LoggerPort, 'warn' | 'debug'>;
}

/**
 * Measures origin and candidate legs for every target at once. A pair only
 * produces a record when both legs succeed; failures never reject the batch.
 */
export class HttpLatencyProbeAdapter implements ProbePort {
  private readonly ignoreBodyWarning: boolean;
  private readonly requestLeg: LegRequester;
  private readonly log: Pick<LoggerPort, 'warn' | 'debug'>;

  constructor(
    private readonly config: ProbeConfig,
    options: LatencyProbeOptions = {},
  ) {
    this.ignoreBodyWarning = options.ignoreBodyWarning ?? false;
    this.requestLeg = options.requestLeg ?? createAxiosLegRequester();
    this.log = options.log ?? defaultLog;
  }

  run(targets: readonly ProbeTarget[]): Promise<Array<LatencyRecord | null>> {
    return Promise.all(targets.map((target) => this.measurePair(target)));
  }

  private async measurePair(target: ProbeTarget): Promise<LatencyRecord | null> {
    const [origin, candidate] = await Promise.allSettled([
      this.requestLeg(this.originLeg(target)),
      this.requestLeg(this.candidateLeg(target)),
    ]);

    if (origin.status === 'fulfilled' && candidate.status === 'fulfilled') {
      return LatencyRecord.create(origin.value, candidate.value);
    }
    if (origin.status === 'rejected') {
      this.report(target, 'origin', origin.reason);
    }
    if (candidate.status === 'rejected') {
      this.report(target, 'candidate', candidate.reason);
    }
    return null;
  }

  private originLeg(target: ProbeTarget): LegRequest {
    return {
      url: this.config.originUrl,
      expectedBody: this.config.originResponseBody,
      timeoutMs: this.config.maxRttMs,
      route: this.config.originViaTunnel
        ? { kind: 'socks', proxyUrl: `socks5h://${urlHost(this.config.listenIp)}:${target.listenerPort}` }
        : { kind: 'direct' },
    };
  }

  private candidateLeg(target: ProbeTarget): LegRequest {
    const derived = this.config.cdnUrl.length === 0;
    return {
      url: derived ? `http://${urlHost(target.address)}/` : this.config.cdnUrl,
      expectedBody: this.config.cdnResponseBody,
      timeoutMs: this.config.maxRttMs,
      route: derived ? { kind: 'direct' } : { kind: 'pinned', address: target.address },
    };
  }

  private report(target: ProbeTarget, leg: 'origin' | 'candidate', reason: unknown): void {
    const error = toError(reason);
    if (error instanceof BodyMismatchError) {
      if (!this.ignoreBodyWarning) {
        this.log.warn(`Unexpected ${leg} response for ${target.address}: ${error.message}`);
      }
      return;
    }
    this.log.debug(`${leg} leg failed for ${target.address}: ${error.message}`);
  }
}
