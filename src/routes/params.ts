// =============================================================================
// PDF SCAN — Query Parameter Parsing
//
// Express hands query values over as string | string[] | ParsedQs. Only a
// single plain string is accepted; anything else is an InvalidParameterError.
// =============================================================================

import { FINDING_TYPES, FindingType, isFindingType } from '../types/entities';
import { InvalidParameterError } from '../types/errors';

function singleValue(value: unknown, name: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new InvalidParameterError(name, `Parameter "${name}" must be given once`);
  }
  return value;
}

/**
 * Non-negative integer within [min, max]; `fallback` when absent.
 */
export function intParam(
  value: unknown,
  name: string,
  range: { fallback: number; min: number; max?: number }
): number {
  const raw = singleValue(value, name);
  if (raw === undefined) return range.fallback;

  const parsed = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (Number.isNaN(parsed) || parsed < range.min || (range.max !== undefined && parsed > range.max)) {
    const bounds = range.max !== undefined
      ? `between ${range.min} and ${range.max}`
      : `an integer >= ${range.min}`;
    throw new InvalidParameterError(name, `Parameter "${name}" must be ${bounds}, got "${raw}"`);
  }
  return parsed;
}

/** ISO-8601 timestamp, or undefined when absent. */
export function timeParam(value: unknown, name: string): Date | undefined {
  const raw = singleValue(value, name);
  if (raw === undefined) return undefined;

  const parsed = new Date(raw);
  if (Number.isNaN(parsed.getTime())) {
    throw new InvalidParameterError(name, `Parameter "${name}" must be an ISO-8601 timestamp, got "${raw}"`);
  }
  return parsed;
}

export function findingTypeParam(value: unknown, name: string): FindingType | undefined {
  const raw = singleValue(value, name);
  if (raw === undefined) return undefined;

  if (!isFindingType(raw)) {
    throw new InvalidParameterError(
      name,
      `Parameter "${name}" must be one of: ${FINDING_TYPES.join(', ')}, got "${raw}"`
    );
  }
  return raw;
}

export function stringParam(value: unknown, name: string): string | undefined {
  return singleValue(value, name);
}
