/**
 * Exposure status constructors and guards
 */

import {
  ExposedStatus,
  ExposureStatus,
  ExposureStatusType,
  NoExposureStatus,
  PositiveStatus,
} from "../../types";

export function noExposure(): NoExposureStatus {
  return { type: ExposureStatusType.NONE };
}

export function exposed(lastExposureDate: number, acknowledged = false): ExposedStatus {
  return { type: ExposureStatusType.EXPOSED, lastExposureDate, acknowledged };
}

export function positive(): PositiveStatus {
  return { type: ExposureStatusType.POSITIVE };
}

export function isExposed(status: ExposureStatus): status is ExposedStatus {
  return status.type === ExposureStatusType.EXPOSED;
}

/**
 * Compile-time exhaustiveness check for switches over status variants
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled exposure status: ${JSON.stringify(value)}`);
}

/**
 * Value equality of two statuses
 */
export function statusEquals(a: ExposureStatus, b: ExposureStatus): boolean {
  switch (a.type) {
    case ExposureStatusType.NONE:
    case ExposureStatusType.POSITIVE:
      return a.type === b.type;
    case ExposureStatusType.EXPOSED:
      return (
        b.type === ExposureStatusType.EXPOSED &&
        a.lastExposureDate === b.lastExposureDate &&
        a.acknowledged === b.acknowledged
      );
    default:
      return assertNever(a);
  }
}
