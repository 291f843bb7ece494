import { logger } from './logger.js';
import { validatePrefixedLine } from './prefixValidator.js';
import { validateReport } from './reportValidator.js';
import type { SampleInputs } from './samples.js';

export interface NamedCheck {
  name: string;
  run: () => boolean;
}

const runIsolated = (check: NamedCheck): boolean => {
  try {
    return check.run();
  } catch (error) {
    logger.error({ err: error, check: check.name }, 'Check threw unexpectedly');
    return false;
  }
};

// Every check runs even after an earlier failure.
export const runChecks = (checks: readonly NamedCheck[]): boolean => {
  const results = checks.map((check) => {
    const passed = runIsolated(check);
    if (passed) {
      logger.info({ check: check.name }, 'Check passed');
    } else {
      logger.error({ check: check.name }, 'Check failed');
    }
    return passed;
  });

  return results.every(Boolean);
};

export const buildDefaultChecks = (samples: SampleInputs, prefix: string): NamedCheck[] => [
  {
    name: 'json-round-trip',
    run: () => {
      const outcome = validateReport(samples.documentText);
      return outcome.ok && outcome.value.passed;
    }
  },
  {
    name: 'bms-data-prefix',
    run: () => {
      const outcome = validatePrefixedLine(samples.prefixedLine, prefix);
      return outcome.ok && outcome.value.passed;
    }
  }
];
