import { loadConfig, type IntegrationConfig } from './config.js';
import { logger } from './logger.js';
import { createServer } from './server.js';
import { PipelineCoordinator } from './pipeline/coordinator.js';
import { ReadinessProber } from './pipeline/readiness.js';
import { RunRegistry } from './pipeline/run-registry.js';
import { AnnotationClient } from './services/annotation-client.js';
import { BuilderClient } from './services/builder-client.js';
import { MinerClient } from './services/miner-client.js';

let config: IntegrationConfig;
try {
  config = loadConfig();
} catch (err) {
  logger.fatal({ err }, 'Invalid configuration, refusing to start');
  process.exit(1);
}
logger.level = config.logLevel;

const builder = new BuilderClient({
  baseUrl: config.builderUrl,
  sharedOutputPath: config.sharedOutputPath,
});
const registry = new RunRegistry(config.runHistoryLimit);

const coordinator = new PipelineCoordinator({
  builder,
  miner: new MinerClient({ baseUrl: config.minerUrl }),
  annotator: new AnnotationClient({ url: config.annotationUrl }),
  readiness: new ReadinessProber(builder, config.readinessTimeoutMs),
  timeouts: {
    builderTimeoutMs: config.builderTimeoutMs,
    minerTimeoutMs: config.minerTimeoutMs,
    annotationTimeoutMs: config.annotationTimeoutMs,
    metadataTimeoutMs: config.readinessTimeoutMs,
  },
  tmpDir: config.tmpDir,
  registry,
});

const app = createServer({ coordinator, registry, maxUploadBytes: config.maxUploadBytes });

app.listen(config.port, () => {
  logger.info(
    {
      port: config.port,
      builderUrl: config.builderUrl,
      minerUrl: config.minerUrl,
      annotationUrl: config.annotationUrl,
    },
    'Integration service listening',
  );
});
