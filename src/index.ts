/**
 * Kubernetes special agent
 *
 * Reads nodes, pods, storage, RBAC and custom metrics from the Kubernetes API
 * and prints them as agent sections on stdout:
 * - cluster-wide sections, unwrapped
 * - per-node sections, wrapped as piggyback data for each node
 * - custom pod metrics per namespace
 */

import { Logger } from 'winston';
import {
  AgentConfig,
  USAGE,
  apiServerUrl,
  loadAgentConfig,
  parseArgs,
} from './config/AgentConfig.js';
import { ApiData } from './kubernetes/ApiData.js';
import { ClusterDataSource } from './kubernetes/ClusterDataSource.js';
import { KubernetesClient } from './kubernetes/KubernetesClient.js';
import { createLogger } from './utils/Logger.js';

export { ApiData } from './kubernetes/ApiData.js';
export { KubernetesClient } from './kubernetes/KubernetesClient.js';
export * from './kubernetes/ErrorHandling.js';
export { parseFraction, parseMemory } from './kubernetes/utils/QuantityParser.js';
export { structuralFold, foldAll, shallowMerge } from './kubernetes/utils/StructuralMerge.js';
export { DescribedMetric, MetricList } from './kubernetes/resources/CustomMetrics.js';
export { Group } from './sections/Group.js';
export { Element } from './sections/Element.js';
export { Section } from './sections/Section.js';

export interface AgentIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  /** Builds the data source; defaults to a token-authenticated KubernetesClient */
  connect?: (config: AgentConfig, logger: Logger) => ClusterDataSource;
}

const defaultIO: AgentIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  env: process.env,
};

function connectWithToken(config: AgentConfig, logger: Logger): ClusterDataSource {
  logger.info('Constructing API client');
  return KubernetesClient.fromToken(
    apiServerUrl(config),
    config.token,
    config.noCertCheck,
    logger,
    config.caFile,
  );
}

/**
 * Run one collection cycle. Resolves to the process exit code: 0 after the
 * report was written, 1 when anything failed. With `--debug` failures are
 * rethrown instead.
 */
export async function main(
  args: readonly string[] = process.argv.slice(2),
  io: AgentIO = defaultIO,
): Promise<number> {
  let debug = args.includes('--debug');

  try {
    const options = parseArgs(args);
    if (options.help) {
      io.stdout(USAGE);
      return 0;
    }

    const config = loadAgentConfig(options, io.env);
    debug = config.debug;

    const logger = createLogger(config.verbose);
    logger.debug('parsed arguments', { ...config, token: '***' });

    const source = (io.connect ?? connectWithToken)(config, logger);
    const data = await ApiData.collect(source, logger);

    const blocks = data.report();
    io.stdout(blocks.map((block) => `${block}\n`).join(''));
    return 0;
  } catch (error) {
    if (debug) {
      throw error;
    }
    io.stderr(`${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
}
