/**
 * shared/errors.ts — Call-level engine errors
 *
 * Row-level problems never throw; they come back from the normalizer as
 * rejected rows. Everything here is raised to the caller, who passed
 * arguments the engine refuses to guess about.
 */

export type EngineErrorCode = 'InvalidHorizon' | 'InvalidGrowthRate' | 'InvalidBaseline' | 'InvalidConfig';

export class EngineError extends Error {
  code: EngineErrorCode;
  details: Record<string, unknown>;
  constructor(message: string, code: EngineErrorCode, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.details = details;
  }
}

export class InvalidHorizonError extends EngineError {
  constructor(horizonYears: number, maxHorizonYears: number) {
    super(
      `Horizon must be an integer between 1 and ${maxHorizonYears} years, got ${horizonYears}`,
      'InvalidHorizon',
      { horizonYears, maxHorizonYears },
    );
    this.name = 'InvalidHorizonError';
  }
}

export class InvalidGrowthRateError extends EngineError {
  constructor(growthRate: number, reason: string) {
    super(`Growth rate ${growthRate} rejected: ${reason}`, 'InvalidGrowthRate', { growthRate });
    this.name = 'InvalidGrowthRateError';
  }
}

export class InvalidBaselineError extends EngineError {
  constructor(value: number, field = 'baselineAmount', requirement = 'a finite number >= 0') {
    super(`${field} must be ${requirement}, got ${value}`, 'InvalidBaseline', { [field]: value });
    this.name = 'InvalidBaselineError';
  }
}

export class ConfigError extends EngineError {
  issues: string[];
  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'InvalidConfig', { issues });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
