/**
 * Proxmox VE check
 * Main entry point for the monitoring probe
 *
 * Prints `Proxmox <LEVEL>: <summary> |<perfdata>` plus detail lines on stdout
 * and resolves to the exit status (0 OK, 1 WARNING, 2 CRITICAL, 3 UNKNOWN,
 * 255 for invalid invocations). Diagnostics go to stderr.
 */

import { loadOptions, renderHelp, type LoadedOptions } from './cli/options.js';
import { runProbe } from './check/ProbeRunner.js';
import { FATAL_EXIT_CODE, ProbeUsageError } from './check/errors.js';
import { ProxmoxClient } from './proxmox/ProxmoxClient.js';
import { createLogger, resolveLogLevel } from './utils/Logger.js';

export { VERSION } from './version.js';
export { Aggregator, type CheckResult, type Finding } from './check/Aggregator.js';
export { Severity } from './check/Severity.js';
export { matches, parseExpression } from './check/Expression.js';
export { filterObjects } from './check/ObjectFilter.js';
export { applyOverrides } from './check/Overrides.js';
export { augmentObjects } from './check/MetricAugmenter.js';
export { evaluateStringRules, evaluateThresholds } from './check/ThresholdEvaluator.js';
export { runProbe } from './check/ProbeRunner.js';
export { ProxmoxClient } from './proxmox/ProxmoxClient.js';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

export async function main(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  io: CliIO = defaultIO,
): Promise<number> {
  let loaded: LoadedOptions;
  try {
    loaded = loadOptions(argv, env);
  } catch (error) {
    if (error instanceof ProbeUsageError) {
      io.stderr(`${error.message}\nRun with --help for usage.\n`);
      return FATAL_EXIT_CODE;
    }
    throw error;
  }

  if (loaded.kind === 'help') {
    io.stdout(renderHelp());
    return 0;
  }

  const { options } = loaded;
  const logger = createLogger({ level: resolveLogLevel(options, env) });

  const result = await runProbe(options, {
    logger,
    createClient: (host) =>
      new ProxmoxClient({
        host,
        port: options.port,
        username: options.username,
        realm: options.realm,
        password: options.password,
        insecure: options.insecure,
        timeoutMs: options.timeout * 1000,
        logger,
      }),
  });

  io.stdout(result.output);
  return result.status;
}
