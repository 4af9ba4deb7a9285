import { Logger } from 'winston';
import type { ProbeOptions } from '../cli/options.js';
import { connectFirstAvailable, type ClientFactory } from '../proxmox/HostFailover.js';
import { Aggregator, type CheckResult } from './Aggregator.js';
import type { ClusterObject } from './ClusterObject.js';
import { augmentObjects } from './MetricAugmenter.js';
import { getMode } from './Modes.js';
import { filterObjects } from './ObjectFilter.js';
import { applyOverrides } from './Overrides.js';
import { Severity } from './Severity.js';
import { evaluateStatus } from './StatusEvaluator.js';
import { evaluateStringRules, evaluateThresholds } from './ThresholdEvaluator.js';

export interface ProbeDependencies {
  createClient: ClientFactory;
  logger?: Logger;
}

export type ProbeSettings = Pick<
  ProbeOptions,
  'host' | 'mode' | 'filter' | 'override' | 'warnstr' | 'critstr'
>;

const RESOURCES_PATH = '/cluster/resources';
const STATUS_PATH = '/cluster/status';

/**
 * Run one check from connection to verdict. The aggregator is finished exactly
 * once on every path; an unexpected error becomes an UNKNOWN result.
 */
export async function runProbe(
  settings: ProbeSettings,
  deps: ProbeDependencies,
): Promise<CheckResult> {
  const aggregator = new Aggregator();
  try {
    return await probe(settings, deps, aggregator);
  } catch (error) {
    if (aggregator.finished) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    deps.logger?.error(`Check failed: ${message}`);
    return aggregator.finish({
      severity: Severity.UNKNOWN,
      short: 'Internal error',
      long: `UNKNOWN: ${message}`,
    });
  }
}

async function probe(
  settings: ProbeSettings,
  deps: ProbeDependencies,
  aggregator: Aggregator,
): Promise<CheckResult> {
  const { logger } = deps;
  const mode = getMode(settings.mode);
  if (!mode) {
    const shown = settings.mode || '(none)';
    return aggregator.finish({
      severity: Severity.UNKNOWN,
      short: `Unknown mode ${shown}`,
      long: `UNKNOWN: mode ${shown} is not one of node, qemu, lxc, storage, status`,
    });
  }

  const connection = await connectFirstAvailable(
    settings.host,
    deps.createClient,
    aggregator,
    logger,
  );
  if (connection.state === 'EXHAUSTED') {
    return aggregator.finish({
      severity: Severity.UNKNOWN,
      short: 'Failed connection',
      long: 'Failed to find a suitable server to connect to',
    });
  }

  let objects: ClusterObject[];
  if (mode.kind === 'resource') {
    const resources = await connection.client.get(RESOURCES_PATH);
    objects = filterObjects(`type=${mode.name}`, resources);
    logger?.verbose(`${objects.length} of ${resources.length} resources are ${mode.name}`);
  } else {
    objects = await connection.client.get(STATUS_PATH);
    logger?.verbose(`${objects.length} status records`);
  }

  objects = filterObjects(settings.filter, objects);
  logger?.verbose(`${objects.length} object(s) left after filter '${settings.filter.source}'`);

  applyOverrides(objects, settings.override, logger);
  if (mode.kind === 'resource') {
    augmentObjects(objects, mode);
  }

  evaluateStringRules(objects, settings.warnstr, Severity.WARNING, mode, aggregator);
  evaluateStringRules(objects, settings.critstr, Severity.CRITICAL, mode, aggregator);

  if (mode.kind === 'resource') {
    evaluateThresholds(objects, mode, aggregator);
  } else {
    evaluateStatus(objects, mode, aggregator);
  }

  return aggregator.finish();
}
