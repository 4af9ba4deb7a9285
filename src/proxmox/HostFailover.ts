import { Logger } from 'winston';
import type { Aggregator } from '../check/Aggregator.js';
import { Severity } from '../check/Severity.js';
import { convertApiError, type ProxmoxError } from './ErrorHandling.js';
import type { ApiVersion, ClusterApiClient } from './ProxmoxClient.js';

export type ClientFactory = (host: string) => ClusterApiClient;

/**
 * Where failover ends: connected to one host, or out of hosts
 */
export type FailoverResult =
  | { state: 'AUTHENTICATED'; client: ClusterApiClient; version: ApiVersion }
  | { state: 'EXHAUSTED' };

/**
 * How a failed host is described in its `DOWN:<host>` detail line, by error code
 */
const FAILURE_LABELS: Readonly<Record<string, string>> = {
  AUTHENTICATION_ERROR: 'authentication failed',
  AUTHORIZATION_ERROR: 'permission denied',
  NETWORK_ERROR: 'unreachable',
  TIMEOUT_ERROR: 'timed out',
  SERVER_UNAVAILABLE: 'server unavailable',
};

type AttemptOutcome =
  | { ok: true; client: ClusterApiClient; version: ApiVersion }
  | { ok: false; reason: string };

/**
 * Try each host in order and stop at the first that authenticates. Every
 * failed host is recorded as a `DOWN:<host>` warning, in host order.
 */
export async function connectFirstAvailable(
  hosts: readonly string[],
  createClient: ClientFactory,
  aggregator: Aggregator,
  logger?: Logger,
): Promise<FailoverResult> {
  for (const host of hosts) {
    logger?.info(`Connecting to ${host}`);
    const outcome = await attempt(host, createClient);

    if (outcome.ok) {
      const message = `Connected to ${host} (API version ${outcome.version.version})`;
      logger?.info(message);
      aggregator.emit({ long: message });
      return { state: 'AUTHENTICATED', client: outcome.client, version: outcome.version };
    }

    logger?.warn(`Host ${host} unavailable: ${outcome.reason}`);
    aggregator.emit({
      severity: Severity.WARNING,
      short: `DOWN:${host}`,
      long: `WARNING: ${host}: ${outcome.reason}`,
    });
  }

  return { state: 'EXHAUSTED' };
}

async function attempt(host: string, createClient: ClientFactory): Promise<AttemptOutcome> {
  try {
    const client = createClient(host);
    if (!(await client.login())) {
      const reason = client.lastError
        ? describeFailure(client.lastError, 'login failed')
        : 'login failed';
      return { ok: false, reason };
    }
    if (!client.checkLoginTicket()) {
      return { ok: false, reason: 'login ticket is not valid' };
    }
    return { ok: true, client, version: await client.apiVersion() };
  } catch (error) {
    return { ok: false, reason: describeFailure(convertApiError(error), 'connection failed') };
  }
}

function describeFailure(error: ProxmoxError, fallback: string): string {
  const label = Object.prototype.hasOwnProperty.call(FAILURE_LABELS, error.code)
    ? FAILURE_LABELS[error.code]
    : fallback;
  return `${label}: ${error.message}`;
}
