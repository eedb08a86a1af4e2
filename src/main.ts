#!/usr/bin/env node
// Scanner entry point: validate config, open alert state, run scan cycles

import 'dotenv/config';
import cron from 'node-cron';
import { AlertDispatcher, LoggingAlertSink } from './alerts/alert-dispatcher';
import { loadCycleInput } from './cycle/cycle-input';
import { createScanCycle } from './cycle/create-scanner';
import { ScanCycle } from './cycle/scan-cycle';
import { SqliteAlertStateStore } from './data/alert-state-store';
import configManager, { ScannerConfig } from './shared/config';
import { ConfigurationError, CycleAbortedError } from './shared/errors';
import logger, { setLogLevel } from './shared/logger';

let currentCycle: AbortController | null = null;
let activeRun: Promise<void> | null = null;

function runOnce(cycle: ScanCycle, dispatcher: AlertDispatcher, inputPath: string): Promise<void> {
  if (activeRun) {
    logger.warn('[Main] Previous cycle still running, skipping this tick');
    return activeRun;
  }

  activeRun = runCycle(cycle, dispatcher, inputPath).finally(() => {
    activeRun = null;
    currentCycle = null;
  });
  return activeRun;
}

async function runCycle(cycle: ScanCycle, dispatcher: AlertDispatcher, inputPath: string): Promise<void> {
  const controller = new AbortController();
  currentCycle = controller;
  try {
    const input = loadCycleInput(inputPath);
    const result = await cycle.run(input, { signal: controller.signal });
    if (result.aborted) {
      logger.warn(`[Main] Cycle ${result.runId} was interrupted; dispatching ${result.events.length} committed alert(s)`);
    }
    const failedSinks = await dispatcher.dispatch(result.events);
    if (failedSinks.length > 0) {
      logger.warn(`[Main] Delivery failed for sink(s): ${failedSinks.join(', ')}`);
    }
  } catch (error) {
    if (error instanceof CycleAbortedError) {
      logger.warn(`[Main] ${error.message}`);
    } else {
      logger.error('[Main] Scan cycle failed:', error);
    }
  }
}

function loadConfigOrExit(): ScannerConfig {
  try {
    return configManager.get();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`[Main] ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const config = loadConfigOrExit();
  setLogLevel(config.app.logLevel);
  logger.info(`[Main] Starting ${config.app.name} (config: ${configManager.getConfigPath()})`);

  const inputPath = config.scan.inputPath;
  if (!inputPath) {
    logger.error('[Main] No cycle input configured (scan.input_path or CYCLE_INPUT_PATH)');
    process.exit(1);
  }

  let cycle: ScanCycle;
  const store = new SqliteAlertStateStore(config.state.path);
  try {
    cycle = createScanCycle(config, store);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`[Main] ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
  store.initialize();

  const dispatcher = new AlertDispatcher([new LoggingAlertSink()]);

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`[Main] Received ${signal}, shutting down`);
    currentCycle?.abort();
    // Alerts already committed by the aborted cycle still get dispatched
    if (activeRun) await activeRun;
    await store.close();
    process.exit(0);
  };
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((error) => logger.error('[Main] Shutdown failed:', error));
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((error) => logger.error('[Main] Shutdown failed:', error));
  });

  if (!config.scan.cron) {
    await runOnce(cycle, dispatcher, inputPath);
    await store.close();
    return;
  }

  logger.info(`[Main] Scheduling scans with cron "${config.scan.cron}"`);
  cron.schedule(config.scan.cron, () => {
    runOnce(cycle, dispatcher, inputPath).catch((error) => {
      logger.error('[Main] Scheduled scan failed:', error);
    });
  });
}

main().catch((error) => {
  logger.error('[Main] Fatal error:', error);
  process.exit(1);
});
