/**
 * Live match sentinel: process entry point.
 *
 * Polls the series-state feed and watches the screen, turning both into
 * tactical events and conclusions on one event surface.
 */

import { config as dotenvConfig } from 'dotenv';
dotenvConfig();

import { ConfigError, loadConfig } from './config.js';
import type { SentinelConfig } from './config.js';
import { logger } from './logger.js';
import { createSentinel } from './sentinel.js';
import type { VisionAdapters } from './sentinel.js';
import { GridClient, GridStateFetcher } from './state/grid-client.js';
import { AnthropicImageClassifier, OllamaImageClassifier } from './vision/classifier.js';
import type { ImageClassifier } from './vision/classifier.js';
import { createScreenCapture, encodeJpeg } from './vision/capture.js';

function createClassifier(config: SentinelConfig): ImageClassifier {
  if (config.classifierBackend === 'anthropic') {
    return new AnthropicImageClassifier({ apiKey: config.anthropicApiKey, model: config.anthropicModel });
  }
  return new OllamaImageClassifier({ url: config.ollamaUrl, model: config.ollamaModel });
}

function createVisionAdapters(config: SentinelConfig): VisionAdapters | undefined {
  if (!config.visionEnabled) return undefined;
  return {
    capture: createScreenCapture(config.screenId),
    classifier: createClassifier(config),
    encode: encodeJpeg,
  };
}

const controller = new AbortController();
let running: Promise<void> | null = null;
let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info(`Received ${signal} — stopping loops...`);
  controller.abort();
  try {
    if (running) await running;
    logger.info('Shutdown complete.');
  } catch (err) {
    logger.error('Error during shutdown:', err);
  }
  process.exit(0);
}

process.on('SIGTERM', () => { void gracefulShutdown('SIGTERM'); });
process.on('SIGINT', () => { void gracefulShutdown('SIGINT'); });

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection:', reason);
});

process.on('uncaughtException', (err) => {
  logger.error('Uncaught exception:', err);
  void gracefulShutdown('uncaughtException');
});

async function main(): Promise<void> {
  const config = loadConfig();

  logger.info('Match sentinel starting...');
  logger.info(`  Series: ${config.seriesId}`);
  logger.info(`  State feed: ${config.gridSeriesStateUrl} (every ${config.pollIntervalMs / 1000}s)`);
  logger.info(`  History: ${config.historyFilePath} (last ${config.historyWindowSize})`);
  logger.info(`  Vision: ${config.visionEnabled ? `${config.classifierBackend} at ${config.classificationHz} Hz` : 'disabled'}`);

  const source = new GridStateFetcher(new GridClient({
    apiKey: config.gridApiKey,
    url: config.gridSeriesStateUrl,
    timeoutMs: config.gridRequestTimeoutMs,
  }));

  const sentinel = createSentinel(config, { source, vision: createVisionAdapters(config) });

  sentinel.sink.on('tactical', (event) => {
    logger.info(`Event: ${event.eventType} — ${event.description}`);
  });
  sentinel.sink.on('visual', (event) => {
    if (event.label === 'KILL' || event.label === 'DEATH' || event.label === 'ROUND_END') {
      logger.info(`Visual event: ${event.label}`);
    }
  });

  running = sentinel.start(controller.signal);
  await running;
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    logger.error(`Configuration error: ${err.message}`);
  } else {
    logger.error('Fatal startup error:', err);
  }
  process.exit(1);
});
