import type { Aggregator } from './Aggregator.js';
import { fieldText, isTruthy, type ClusterObject } from './ClusterObject.js';
import type { StatusMode } from './Modes.js';
import { Severity } from './Severity.js';
import { perfToken } from './ThresholdEvaluator.js';

/**
 * Built-in rules for `/cluster/status` records: the cluster must be quorate
 * and every member node online.
 */
export function evaluateStatus(
  objects: readonly ClusterObject[],
  mode: StatusMode,
  aggregator: Aggregator,
): void {
  for (const object of objects) {
    const name = mode.objectName(object);
    const type = fieldText(object, 'type');

    if (type === 'cluster') {
      const quorate = isTruthy(object.quorate);
      if (!quorate) {
        aggregator.emit({
          severity: Severity.CRITICAL,
          short: `${name} not quorate`,
          long: `CRITICAL: ${name}: cluster is not quorate`,
        });
      }
      aggregator.emit({
        perfdata: perfToken(`${name}.quorate`, quorate ? '1' : '0', '', '', '0', '1'),
      });
      aggregator.emit({
        perfdata: perfToken(`${name}.nodes`, fieldText(object, 'nodes') || '0', '', '', '0', ''),
      });
    } else if (type === 'node') {
      const online = isTruthy(object.online);
      if (!online) {
        aggregator.emit({
          severity: Severity.CRITICAL,
          short: `${name} offline`,
          long: `CRITICAL: ${name}: node is offline`,
        });
      }
      aggregator.emit({
        perfdata: perfToken(`${name}.online`, online ? '1' : '0', '', '', '0', '1'),
      });
    }
  }
}
