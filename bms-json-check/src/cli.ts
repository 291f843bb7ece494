import { buildDefaultChecks, runChecks } from './checks.js';
import { config } from './config.js';
import { logger } from './logger.js';
import { buildSamples } from './samples.js';

const start = (): number => {
  logger.info({ prefix: config.prefix }, 'Starting BMS JSON serialization checks');
  const samples = buildSamples(config.prefix);
  const success = runChecks(buildDefaultChecks(samples, config.prefix));

  if (success) {
    logger.info('All checks passed, BMS JSON output is ready for consumers');
    return 0;
  }

  logger.error('Some checks failed, please check the JSON format');
  return 1;
};

try {
  process.exitCode = start();
} catch (error) {
  logger.error({ err: error }, 'Failed to run BMS JSON checks');
  process.exitCode = 1;
}
