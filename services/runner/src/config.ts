import { logger } from '@batchrun/shared';

const log = logger.child({ module: 'config' });

export interface RunnerConfig {
  manifestPath: string;
  pollIntervalMs: number;
  /** Write the run summary here as JSON in addition to logging it */
  summaryPath?: string;
}

function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    log.warn({ [name]: value, using: fallback }, `invalid ${name}, falling back to default`);
    return fallback;
  }
  return parsed;
}

export function loadConfig(argv: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const manifestPath = argv[0] ?? env.BATCHRUN_MANIFEST;
  if (!manifestPath) {
    throw new Error('a manifest path is required (first argument or BATCHRUN_MANIFEST)');
  }

  const config: RunnerConfig = {
    manifestPath,
    pollIntervalMs: parsePositiveInt('BATCHRUN_POLL_INTERVAL_MS', env.BATCHRUN_POLL_INTERVAL_MS, 10_000),
    summaryPath: env.BATCHRUN_SUMMARY_PATH || undefined,
  };

  log.info({ manifestPath: config.manifestPath, pollIntervalMs: config.pollIntervalMs }, 'runner config loaded');
  return config;
}
