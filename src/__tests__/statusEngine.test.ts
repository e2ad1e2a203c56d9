/**
 * Exposure Status Engine Tests
 *
 * Tests:
 * 1. Summary construction (last exposure day derived from the check date)
 * 2. Qualification gating (matched keys, threshold, missing policy, invalid input)
 * 3. Status transitions (first exposure, newer, older, same day, POSITIVE absorbing)
 * 4. Notification decision
 * 5. Full evaluation of consecutive checks
 */

import { ExposureStatusType, RawExposureSummary, RiskPolicy } from "../types";
import {
  buildExposureSummary,
  computeExposureStatus,
  evaluate,
  exposed,
  isQualifying,
  noExposure,
  positive,
  shouldSendNotification,
  statusEquals,
  validateRawSummary,
} from "../utils/exposure";
import { daysBefore, isoDateString, startOfUtcDay, wholeDaysBetween } from "../utils/exposure/dates";

const POLICY: RiskPolicy = { minimumRiskScore: 20, maxSummaryCount: 6, maxInfoCount: 14 };

/** Start of a June 2020 UTC day */
const day = (n: number): number => Date.UTC(2020, 5, n);
/** Noon of a June 2020 UTC day, a typical check time */
const noon = (n: number): number => Date.UTC(2020, 5, n, 12);

function rawSummary(overrides: Partial<RawExposureSummary> = {}): RawExposureSummary {
  return {
    daysSinceLastExposure: 2,
    matchedKeyCount: 1,
    maximumRiskScore: 30,
    attenuationDurationMinutes: { high: 10, medium: 5, low: 0 },
    riskScoreSum: 30,
    ...overrides,
  };
}

describe("Exposure Status Engine", () => {
  describe("Test 1: Date helpers and summary construction", () => {
    it("should truncate timestamps to the start of the UTC day", () => {
      expect(startOfUtcDay(noon(10))).toBe(day(10));
      expect(startOfUtcDay(day(10))).toBe(day(10));
    });

    it("should count whole days and format ISO days", () => {
      expect(daysBefore(noon(10), 2)).toBe(day(8));
      expect(wholeDaysBetween(day(8), noon(12))).toBe(4);
      expect(wholeDaysBetween(noon(12), day(8))).toBe(-4);
      expect(isoDateString(noon(15))).toBe("2020-06-15");
    });

    it("should derive the last exposure day from the check date", () => {
      const summary = buildExposureSummary(noon(10), rawSummary());

      expect(summary).toEqual({
        date: noon(10),
        lastExposureDate: day(8),
        matchedKeyCount: 1,
        maximumRiskScore: 30,
        highRiskAttenuationDurationMinutes: 10,
        mediumRiskAttenuationDurationMinutes: 5,
        lowRiskAttenuationDurationMinutes: 0,
        riskScoreSum: 30,
        exposureInfos: [],
      });
    });
  });

  describe("Test 2: Qualification gating", () => {
    it("should qualify at exactly the minimum risk score", () => {
      const summary = buildExposureSummary(noon(10), rawSummary({ maximumRiskScore: 20 }));
      expect(isQualifying(summary, POLICY)).toBe(true);
    });

    it("should not qualify below the minimum risk score", () => {
      const result = evaluate(noon(10), rawSummary({ maximumRiskScore: 19 }), noExposure(), POLICY);

      expect(result.qualifying).toBe(false);
      expect(result.shouldFetchDetails).toBe(false);
      expect(result.rejection).toBe("below-minimum-risk-score");
      expect(result.status).toEqual(noExposure());
      expect(result.summary?.lastExposureDate).toBe(day(8));
    });

    it("should not qualify without matched keys, even at a high risk score", () => {
      const result = evaluate(
        noon(10),
        rawSummary({ matchedKeyCount: 0, maximumRiskScore: 100 }),
        noExposure(),
        POLICY,
      );

      expect(result.qualifying).toBe(false);
      expect(result.rejection).toBe("no-matched-keys");
    });

    it("should fail closed when the policy is unavailable", () => {
      const current = exposed(day(5));
      const result = evaluate(noon(10), rawSummary({ maximumRiskScore: 100 }), current, null);

      expect(result.qualifying).toBe(false);
      expect(result.rejection).toBe("configuration-unavailable");
      expect(result.status).toBe(current);
      expect(result.summary).not.toBeNull();
    });

    it("should record but not qualify a summary with negative counts", () => {
      const result = evaluate(noon(10), rawSummary({ matchedKeyCount: -1 }), noExposure(), POLICY);

      expect(result.qualifying).toBe(false);
      expect(result.rejection).toBe("invalid-summary");
      expect(result.error).toBe("Invalid matchedKeyCount");
      expect(result.summary).not.toBeNull();
    });

    it("should produce no summary when no day can be derived", () => {
      const invalidDate = evaluate(Number.NaN, rawSummary(), noExposure(), POLICY);
      const invalidDays = evaluate(
        noon(10),
        rawSummary({ daysSinceLastExposure: Number.POSITIVE_INFINITY }),
        noExposure(),
        POLICY,
      );

      expect(invalidDate.summary).toBeNull();
      expect(invalidDate.rejection).toBe("invalid-summary");
      expect(invalidDays.summary).toBeNull();
      expect(invalidDays.qualifying).toBe(false);
    });

    it("should not qualify a check dated beyond what a Date can hold", () => {
      const current = exposed(day(5));
      const farFuture = evaluate(9e15, rawSummary({ daysSinceLastExposure: 0 }), current, POLICY);
      const daysTooNegative = evaluate(
        noon(10),
        rawSummary({ daysSinceLastExposure: -1e8 }),
        current,
        POLICY,
      );

      expect(farFuture).toEqual({
        status: current,
        qualifying: false,
        shouldFetchDetails: false,
        summary: null,
        rejection: "invalid-summary",
        error: "Invalid check dates",
      });
      expect(daysTooNegative.summary).toBeNull();
      expect(daysTooNegative.status).toBe(current);
    });

    it("should still notify a real exposure after a check with an unrepresentable date", () => {
      const afterBadCheck = evaluate(9e15, rawSummary({ daysSinceLastExposure: 0 }), noExposure(), POLICY);
      const real = evaluate(noon(10), rawSummary(), afterBadCheck.status, POLICY);

      expect(afterBadCheck.status).toEqual(noExposure());
      expect(real.status).toEqual(exposed(day(8)));
      expect(real.shouldFetchDetails).toBe(true);
    });

    it("should report the first invalid field", () => {
      expect(validateRawSummary(rawSummary())).toEqual({ valid: true });
      expect(validateRawSummary(rawSummary({ daysSinceLastExposure: 1.5 }))).toEqual({
        valid: false,
        error: "Invalid daysSinceLastExposure",
      });
      expect(
        validateRawSummary(rawSummary({ attenuationDurationMinutes: { high: -1, medium: 0, low: 0 } })),
      ).toEqual({ valid: false, error: "Invalid attenuationDurationMinutes" });
      expect(validateRawSummary(rawSummary({ riskScoreSum: Number.NaN }))).toEqual({
        valid: false,
        error: "Invalid riskScoreSum",
      });
    });
  });

  describe("Test 3: Status transitions", () => {
    const summaryForDay8 = buildExposureSummary(noon(10), rawSummary());

    it("should move from NONE to unacknowledged EXPOSED", () => {
      expect(computeExposureStatus(summaryForDay8, noExposure())).toEqual(exposed(day(8), false));
    });

    it("should advance to a more recent exposure and keep the acknowledgement", () => {
      const result = computeExposureStatus(summaryForDay8, exposed(day(6), true));
      expect(result).toEqual(exposed(day(8), true));
    });

    it("should keep the current status for an older or same-day exposure", () => {
      const current = exposed(day(8), false);
      const older = buildExposureSummary(noon(10), rawSummary({ daysSinceLastExposure: 5 }));

      expect(computeExposureStatus(summaryForDay8, current)).toBe(current);
      expect(computeExposureStatus(older, current)).toBe(current);
    });

    it("should never leave POSITIVE", () => {
      const current = positive();
      expect(computeExposureStatus(summaryForDay8, current)).toBe(current);
    });
  });

  describe("Test 4: Notification decision", () => {
    it("should notify on the first exposure", () => {
      expect(shouldSendNotification(noExposure(), exposed(day(8)))).toBe(true);
    });

    it("should notify only for a strictly more recent exposure", () => {
      expect(shouldSendNotification(exposed(day(8)), exposed(day(9)))).toBe(true);
      expect(shouldSendNotification(exposed(day(8)), exposed(day(8), true))).toBe(false);
    });

    it("should never notify on transitions touching POSITIVE", () => {
      expect(shouldSendNotification(positive(), positive())).toBe(false);
      expect(shouldSendNotification(exposed(day(8)), positive())).toBe(false);
      expect(shouldSendNotification(noExposure(), noExposure())).toBe(false);
    });
  });

  describe("Test 5: Consecutive checks", () => {
    it("should notify once for the first exposure and not again on the same day", () => {
      const first = evaluate(noon(10), rawSummary(), noExposure(), POLICY);

      expect(first.qualifying).toBe(true);
      expect(first.status).toEqual(exposed(day(8), false));
      expect(first.shouldFetchDetails).toBe(true);
      expect(first.rejection).toBeUndefined();

      const second = evaluate(Date.UTC(2020, 5, 10, 18), rawSummary(), first.status, POLICY);

      expect(second.qualifying).toBe(true);
      expect(second.status).toBe(first.status);
      expect(second.shouldFetchDetails).toBe(false);
    });

    it("should notify again when a later check reports a more recent exposure", () => {
      const first = evaluate(noon(10), rawSummary(), noExposure(), POLICY);
      const later = evaluate(noon(12), rawSummary({ daysSinceLastExposure: 1 }), first.status, POLICY);

      expect(later.status).toEqual(exposed(day(11), false));
      expect(later.shouldFetchDetails).toBe(true);
    });

    it("should record qualifying checks against POSITIVE without changing it", () => {
      const result = evaluate(noon(10), rawSummary({ maximumRiskScore: 90 }), positive(), POLICY);

      expect(result.qualifying).toBe(true);
      expect(result.status.type).toBe(ExposureStatusType.POSITIVE);
      expect(result.shouldFetchDetails).toBe(false);
      expect(result.summary).not.toBeNull();
    });

    it("should compare statuses by value", () => {
      expect(statusEquals(exposed(day(8), true), exposed(day(8), true))).toBe(true);
      expect(statusEquals(exposed(day(8), true), exposed(day(8), false))).toBe(false);
      expect(statusEquals(noExposure(), positive())).toBe(false);
    });
  });
});
