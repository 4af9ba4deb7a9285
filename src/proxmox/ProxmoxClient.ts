import * as https from 'https';
import { URL } from 'url';
import { Logger } from 'winston';
import { z } from 'zod';
import { toClusterObjects, type ClusterObject } from '../check/ClusterObject.js';
import { ProxmoxError, TimeoutError, ValidationError, convertApiError } from './ErrorHandling.js';

/**
 * The operations the check needs from a cluster API session
 */
export interface ClusterApiClient {
  readonly host: string;
  /** Why the last login() returned false, when known */
  readonly lastError?: ProxmoxError;
  login(): Promise<boolean>;
  checkLoginTicket(): boolean;
  apiVersion(): Promise<ApiVersion>;
  get(path: string): Promise<ClusterObject[]>;
}

export interface ApiVersion {
  version: string;
  release?: string;
}

export interface HttpRequest {
  method: 'GET' | 'POST';
  url: string;
  headers: Record<string, string>;
  body?: string;
  rejectUnauthorized: boolean;
  timeoutMs: number;
}

export interface HttpResponse {
  statusCode: number;
  statusMessage: string;
  body: string;
}

export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

/**
 * Configuration options for ProxmoxClient
 */
export interface ProxmoxClientConfig {
  host: string;
  port: number;
  username: string;
  realm: string;
  password: string;

  /**
   * Skip TLS verification (self-signed cluster certificates)
   */
  insecure?: boolean;

  /**
   * Per-request timeout in milliseconds
   */
  timeoutMs?: number;

  logger?: Logger;

  /**
   * HTTP transport; defaults to Node's https module
   */
  transport?: HttpTransport;

  /**
   * Clock used for ticket expiry, in milliseconds
   */
  now?: () => number;
}

/** Proxmox tickets are valid for two hours */
export const TICKET_LIFETIME_MS = 2 * 60 * 60 * 1000;

const DEFAULT_TIMEOUT_MS = 10000;

const TicketResponseSchema = z.object({
  data: z.object({
    ticket: z.string().min(1),
    CSRFPreventionToken: z.string().optional(),
    username: z.string().optional(),
  }),
});

const VersionResponseSchema = z.object({
  data: z.object({
    version: z.string(),
    release: z.string().optional(),
  }),
});

const DataResponseSchema = z.object({
  data: z.unknown(),
});

/**
 * Default transport: a single HTTPS request with the body collected as text
 */
export const httpsTransport: HttpTransport = (request) =>
  new Promise<HttpResponse>((resolve, reject) => {
    const url = new URL(request.url);
    const req = https.request(
      {
        method: request.method,
        hostname: url.hostname,
        port: url.port ? parseInt(url.port, 10) : 443,
        path: `${url.pathname}${url.search}`,
        headers: request.headers,
        rejectUnauthorized: request.rejectUnauthorized,
      },
      (res) => {
        let raw = '';
        res.setEncoding('utf8');
        res.on('data', (chunk: string) => (raw += chunk));
        res.on('error', reject);
        res.on('end', () =>
          resolve({
            statusCode: res.statusCode || 0,
            statusMessage: res.statusMessage || '',
            body: raw,
          }),
        );
      },
    );
    req.setTimeout(request.timeoutMs, () => {
      req.destroy(
        new TimeoutError(`Request to ${url.host} timed out after ${request.timeoutMs}ms`),
      );
    });
    req.on('error', reject);
    if (request.body !== undefined) {
      req.write(request.body);
    }
    req.end();
  });

/**
 * ProxmoxClient holds one ticket-authenticated session against a single
 * Proxmox VE host.
 */
export class ProxmoxClient implements ClusterApiClient {
  private readonly logger?: Logger;
  private readonly transport: HttpTransport;
  private readonly now: () => number;
  private ticket?: string;
  private csrfToken?: string;
  private ticketIssuedAt?: number;
  private _lastError?: ProxmoxError;

  constructor(private readonly config: ProxmoxClientConfig) {
    this.logger = config.logger;
    this.transport = config.transport ?? httpsTransport;
    this.now = config.now ?? Date.now;
  }

  get host(): string {
    return this.config.host;
  }

  /**
   * The error behind the most recent failed login, if any
   */
  get lastError(): ProxmoxError | undefined {
    return this._lastError;
  }

  /**
   * Request an authentication ticket. Returns false instead of throwing so the
   * caller can move on to the next host.
   */
  public async login(): Promise<boolean> {
    const username = this.config.username.includes('@')
      ? this.config.username
      : `${this.config.username}@${this.config.realm}`;
    const body = new URLSearchParams({ username, password: this.config.password }).toString();

    try {
      const response = await this.request('POST', '/access/ticket', body);
      const parsed = TicketResponseSchema.safeParse(response);
      if (!parsed.success) {
        throw new ValidationError('Ticket response did not contain a ticket', {
          issues: parsed.error.issues,
        });
      }

      this.ticket = parsed.data.data.ticket;
      this.csrfToken = parsed.data.data.CSRFPreventionToken;
      this.ticketIssuedAt = this.now();
      this._lastError = undefined;
      this.logger?.debug(`Obtained ticket for ${username} on ${this.host}`);
      return true;
    } catch (error) {
      this._lastError = convertApiError(error);
      this.ticket = undefined;
      this.logger?.warn(`Login to ${this.host} failed: ${this._lastError.message}`);
      return false;
    }
  }

  /**
   * True while a ticket is held and younger than its two-hour lifetime. The
   * ticket's own hex timestamp is preferred over the local issue time.
   */
  public checkLoginTicket(): boolean {
    if (!this.ticket) {
      return false;
    }
    const issuedAt = ticketTimestamp(this.ticket) ?? this.ticketIssuedAt;
    if (issuedAt === undefined) {
      return false;
    }
    return this.now() - issuedAt < TICKET_LIFETIME_MS;
  }

  public async apiVersion(): Promise<ApiVersion> {
    const response = await this.request('GET', '/version');
    const parsed = VersionResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new ValidationError(`Unexpected /version response from ${this.host}`, {
        issues: parsed.error.issues,
      });
    }
    return parsed.data.data;
  }

  /**
   * GET an API path and return its `data` member as cluster objects
   */
  public async get(path: string): Promise<ClusterObject[]> {
    const response = await this.request('GET', path);
    const parsed = DataResponseSchema.safeParse(response);
    if (!parsed.success || parsed.data.data === null || parsed.data.data === undefined) {
      return [];
    }
    return toClusterObjects(parsed.data.data);
  }

  private async request(method: 'GET' | 'POST', path: string, body?: string): Promise<unknown> {
    const url = `https://${this.config.host}:${this.config.port}/api2/json${path}`;
    const headers: Record<string, string> = { Accept: 'application/json' };

    if (this.ticket) {
      headers.Cookie = `PVEAuthCookie=${this.ticket}`;
      if (method === 'POST' && this.csrfToken) {
        headers.CSRFPreventionToken = this.csrfToken;
      }
    }
    if (body !== undefined) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
    }

    this.logger?.debug(`${method} ${url}`);

    let response: HttpResponse;
    try {
      response = await this.transport({
        method,
        url,
        headers,
        body,
        rejectUnauthorized: !this.config.insecure,
        timeoutMs: this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      });
    } catch (error) {
      throw convertApiError(error);
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      this.logger?.debug(
        `${method} ${url} failed: ${response.statusCode} ${response.statusMessage}. Body: ${response.body.slice(0, 1024)}`,
      );
      throw convertApiError({
        statusCode: response.statusCode,
        message: `HTTP ${response.statusCode} ${response.statusMessage}`.trim(),
      });
    }

    try {
      const parsed: unknown = response.body ? JSON.parse(response.body) : {};
      return parsed;
    } catch (error) {
      throw new ValidationError(`Invalid JSON from ${url}`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/**
 * Issue time embedded in a ticket (`PVE:user@realm:HEXTIME::signature`),
 * in milliseconds.
 */
export function ticketTimestamp(ticket: string): number | undefined {
  const hex = ticket.split(':')[2];
  if (!hex || !/^[0-9A-Fa-f]+$/.test(hex)) {
    return undefined;
  }
  return parseInt(hex, 16) * 1000;
}
