import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { logger } from '@batchrun/shared';
import { AwsBatchDriver } from '@batchrun/awsbatch';
import { loadConfig } from './config.js';
import { loadManifest } from './manifest.js';
import { runManifest } from './runner.js';

const log = logger.child({ module: 'runner-main' });

async function main(): Promise<number> {
  const config = loadConfig();
  const tasks = await loadManifest(config.manifestPath);
  log.info({ tasks: tasks.length, manifest: config.manifestPath }, 'starting batch run');

  const driver = new AwsBatchDriver();
  const controller = new AbortController();

  // First signal stops the run and terminates outstanding jobs; a second one exits immediately
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      log.warn({ signal }, 'second signal received, exiting without cleanup');
      process.exit(130);
    }
    log.info({ signal }, 'stopping run');
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const summary = await runManifest(driver, tasks, {
      pollIntervalMs: config.pollIntervalMs,
      signal: controller.signal,
    });
    if (config.summaryPath) {
      await mkdir(dirname(config.summaryPath), { recursive: true });
      await writeFile(config.summaryPath, JSON.stringify(summary, null, 2) + '\n');
    }
    return summary.failed > 0 || summary.killed > 0 ? 1 : 0;
  } finally {
    await driver.shutdown();
  }
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((err) => {
    log.fatal({ err }, 'batch run failed');
    process.exit(1);
  });
