/**
 * Backend Forwarder - one forwarding attempt per inbound request
 *
 * The backend sees the original method, path, query, body and cookies plus
 * identity headers derived from the routing decision. Nothing else the client
 * sent is passed on, so a client cannot plant its own identity headers.
 *
 * The timeout covers the whole exchange. If it fires after the headers have
 * been relayed, the body stream is destroyed and the caller drops the
 * connection.
 */

import type { IncomingHttpHeaders } from 'node:http';
import { Readable } from 'node:stream';
import type { AuditEntry } from '../core/types.js';
import { AuditService } from '../core/audit-service.js';
import type { RoutingDecision } from './role-router.js';
import { NullPortalMetrics, type PortalMetrics } from '../metrics/portal-metrics.js';
import { PortalError, PortalErrors, errorMessage } from '../utils/errors.js';

export const DEFAULT_BACKEND_TIMEOUT_MS = 30000;

/** Client headers relayed to the backend as-is. */
const PASSTHROUGH_REQUEST_HEADERS = ['cookie', 'content-type', 'accept', 'accept-language', 'user-agent'];

/** Framing headers dropped from the relayed response. */
const STRIPPED_RESPONSE_HEADERS = new Set(['content-encoding', 'content-length', 'transfer-encoding', 'connection']);

/** Socket-level failures that mean the backend could not be reached. */
const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

const BODYLESS_METHODS = new Set(['GET', 'HEAD']);

export interface ForwardRequest {
  method: string;
  /** Path and query as received, e.g. `/reports?year=2024` */
  url: string;
  headers: IncomingHttpHeaders;
  body?: Buffer;
  remoteAddress?: string;
}

export interface ForwardedResponse {
  status: number;
  headers: Array<[string, string]>;
  body: Readable | null;
}

export interface BackendForwarderConfig {
  timeoutMs?: number;
}

export interface BackendForwarderDeps {
  audit?: AuditService;
  metrics?: PortalMetrics;
}

export class BackendForwarder {
  private readonly timeoutMs: number;
  private readonly audit: AuditService;
  private readonly metrics: PortalMetrics;

  constructor(config: BackendForwarderConfig = {}, deps: BackendForwarderDeps = {}) {
    this.timeoutMs = config.timeoutMs ?? DEFAULT_BACKEND_TIMEOUT_MS;
    this.audit = deps.audit ?? new AuditService();
    this.metrics = deps.metrics ?? new NullPortalMetrics();
  }

  /**
   * Forward once; redirects are returned to the caller, never followed.
   *
   * @throws PortalError BACKEND_UNAVAILABLE | BACKEND_TIMEOUT | PROXY_INTERNAL_ERROR
   */
  async forward(request: ForwardRequest, decision: RoutingDecision): Promise<ForwardedResponse> {
    const role = decision.primaryRole;
    let target: string;
    try {
      target = buildTargetUrl(decision.target.url, request.url);
    } catch (error) {
      throw await this.fail(PortalErrors.PROXY_INTERNAL_ERROR(decision.target.url, errorMessage(error)), decision);
    }

    const controller = new AbortController();
    let body: Readable | null = null;
    const timer = setTimeout(() => {
      controller.abort();
      if (body) {
        console.error(`[BackendForwarder] ${target} still streaming after ${this.timeoutMs}ms, dropping response`);
        this.metrics.routed('backend_timeout', role);
        body.destroy(PortalErrors.BACKEND_TIMEOUT(role, target, this.timeoutMs));
      }
    }, this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(target, {
        method: request.method,
        headers: buildForwardHeaders(request, decision),
        body: BODYLESS_METHODS.has(request.method.toUpperCase()) ? undefined : request.body,
        redirect: 'manual',
        signal: controller.signal,
      });
    } catch (error) {
      clearTimeout(timer);
      throw await this.fail(classifyFetchFailure(error, controller.signal.aborted, role, target, this.timeoutMs), decision);
    }

    if (response.body) {
      body = Readable.fromWeb(response.body);
      body.once('close', () => clearTimeout(timer));
    } else {
      clearTimeout(timer);
    }

    this.metrics.routed('forwarded', role);
    console.log(`[BackendForwarder] ${request.method} ${request.url} → ${target} (${response.status})`);
    await this.record({
      source: 'router:forward',
      userId: decision.username,
      action: 'forwarded',
      success: true,
      metadata: { target, method: request.method, status: response.status, primaryRole: role },
    });

    return {
      status: response.status,
      headers: relayHeaders(response.headers),
      body,
    };
  }

  private async fail(error: PortalError, decision: RoutingDecision): Promise<PortalError> {
    const outcome =
      error.code === 'BACKEND_UNAVAILABLE'
        ? 'backend_unavailable'
        : error.code === 'BACKEND_TIMEOUT'
          ? 'backend_timeout'
          : 'proxy_error';
    this.metrics.routed(outcome, decision.primaryRole);
    console.error(`[BackendForwarder] ${error.code}: ${error.message}`);
    await this.record({
      source: 'router:forward',
      userId: decision.username,
      action: 'forward_failed',
      success: false,
      reason: error.code,
      error: error.message,
      metadata: { target: decision.target.url, primaryRole: decision.primaryRole },
    });
    return error;
  }

  private async record(entry: Omit<AuditEntry, 'timestamp'>): Promise<void> {
    await this.audit.log({ timestamp: new Date(), ...entry });
  }
}

/**
 * Join the backend base URL and the inbound path, keeping any base path.
 */
export function buildTargetUrl(base: string, path: string): string {
  const url = new URL(base.replace(/\/+$/, '') + (path.startsWith('/') ? path : `/${path}`));
  return url.toString();
}

export function buildForwardHeaders(request: ForwardRequest, decision: RoutingDecision): Headers {
  const headers = new Headers();

  for (const name of PASSTHROUGH_REQUEST_HEADERS) {
    const value = request.headers[name];
    if (typeof value === 'string') {
      headers.set(name, value);
    } else if (Array.isArray(value)) {
      headers.set(name, value.join(', '));
    }
  }

  headers.set('X-User-Email', decision.email);
  headers.set('X-User-Name', decision.username);
  headers.set('X-User-Roles', decision.roles.join(','));
  headers.set('X-Primary-Role', decision.primaryRole);

  const forwardedFor = firstHeader(request.headers['x-forwarded-for']) ?? request.remoteAddress;
  if (forwardedFor) {
    headers.set('X-Forwarded-For', forwardedFor);
  }
  headers.set('X-Forwarded-Proto', firstHeader(request.headers['x-forwarded-proto']) ?? 'http');

  return headers;
}

export function relayHeaders(headers: Headers): Array<[string, string]> {
  const relayed: Array<[string, string]> = [];
  headers.forEach((value, name) => {
    if (!STRIPPED_RESPONSE_HEADERS.has(name) && name !== 'set-cookie') {
      relayed.push([name, value]);
    }
  });
  // Headers joins set-cookie values; each cookie needs its own line
  for (const cookie of headers.getSetCookie()) {
    relayed.push(['set-cookie', cookie]);
  }
  return relayed;
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first?.trim() || undefined;
}

function classifyFetchFailure(
  error: unknown,
  timedOut: boolean,
  role: string,
  target: string,
  timeoutMs: number
): PortalError {
  if (timedOut) {
    return PortalErrors.BACKEND_TIMEOUT(role, target, timeoutMs);
  }

  const code = errorCode(error instanceof Error ? error.cause : undefined) ?? errorCode(error);
  if (code && CONNECTION_ERROR_CODES.has(code)) {
    return PortalErrors.BACKEND_UNAVAILABLE(role, target, code);
  }
  return PortalErrors.PROXY_INTERNAL_ERROR(target, errorMessage(error));
}

function errorCode(error: unknown): string | undefined {
  if (error !== null && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
