import { createLogger } from '@aph/logger';
import { ValidationError } from '@aph/tee-core';
import {
  MEASUREMENT_REGISTERS,
  type BaselineReference,
  type MeasurementRegisterSet,
  type RegisterComparison,
  type RegisterName,
  type ValidationVerdict,
} from '@aph/types';
import type { BaselineRegistry } from './baseline-registry.js';

const log = createLogger('baseline-validator');

function present(value: string | undefined): string | null {
  return value ? value : null;
}

function compare(register: RegisterName, expected: string | undefined, actual: string | undefined): RegisterComparison {
  const e = present(expected);
  const a = present(actual);
  return {
    register,
    expected: e,
    actual: a,
    matches: e !== null && a !== null && e.toLowerCase() === a.toLowerCase(),
  };
}

function comparisons(measurements: MeasurementRegisterSet, baseline: BaselineReference | undefined): RegisterComparison[] {
  const result: RegisterComparison[] = MEASUREMENT_REGISTERS.map((register) =>
    compare(register, baseline?.[register], measurements[register]),
  );
  if (baseline?.reportData !== undefined) {
    result.push(compare('reportData', baseline.reportData, measurements.reportData));
  }
  return result;
}

/** Compares measured registers against the configured baseline for a VM. */
export class BaselineValidator {
  constructor(
    private readonly registry: BaselineRegistry,
    private readonly now: () => number = Date.now,
  ) {}

  validate(measurements: MeasurementRegisterSet, vmIdentity: string = measurements.vmIdentity): ValidationVerdict {
    const baseline = this.registry.get(vmIdentity);
    const registers = comparisons(measurements, baseline);
    const verifiedAt = this.now();

    if (!baseline) {
      log.warn({ vmIdentity, stage: 'validate' }, 'no baseline configured');
      return {
        vmIdentity,
        passed: false,
        reason: 'no_baseline_configured',
        registers,
        mismatched: [],
        measurements,
        verifiedAt,
      };
    }

    const mismatched = registers.filter((r) => !r.matches).map((r) => r.register);
    const passed = mismatched.length === 0;
    log.info({ vmIdentity, stage: 'validate', passed, mismatched }, 'baseline comparison complete');

    return {
      vmIdentity,
      passed,
      ...(passed ? {} : { reason: 'register_mismatch' as const }),
      registers,
      mismatched,
      measurements,
      verifiedAt,
    };
  }

  /** Throw unless the verdict passed. */
  assertVerified(verdict: ValidationVerdict): void {
    if (verdict.passed) return;
    if (verdict.reason === 'no_baseline_configured') {
      throw new ValidationError('NoBaselineConfigured', `No baseline configured for ${verdict.vmIdentity}`);
    }
    throw new ValidationError(
      'RegisterMismatch',
      `${verdict.vmIdentity} does not match its baseline: ${verdict.mismatched.join(', ')}`,
    );
  }
}
