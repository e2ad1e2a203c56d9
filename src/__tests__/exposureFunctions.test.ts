/**
 * Exposure Cloud Functions Tests
 *
 * Tests:
 * 1. processExposureCheck marks checks completed or failed
 * 2. uploadExposureData authentication, validation and failure mapping
 * 3. getExposureStatus and acknowledgeExposure
 * 4. updateCountriesOfInterest
 * 5. Admin-only reset and history cleanup
 */

import * as admin from "firebase-admin";
import { CheckStatus, ExposureStatusType } from "../types";
import { exposed, positive } from "../utils/exposure";
import { _testing } from "../utils/exposureService";
import {
  acknowledgeExposure,
  clearExposureHistory,
  getExposureStatus,
  resetExposureStatus,
  updateCountriesOfInterest,
} from "../functions/exposureStatus";
import { handleExposureCheck } from "../functions/processExposureCheck";
import { uploadExposureData } from "../functions/uploadExposureData";
import { TestHarness, createHarness } from "./fakes";
import { createMockContext, handlerOf } from "./setup";

// Get mocked firestore
const mockFirestore = admin.firestore() as unknown as {
  runTransaction: jest.Mock;
};

const USER = "user-1";
const day = (n: number): number => Date.UTC(2020, 5, n);
const noon = (n: number): number => Date.UTC(2020, 5, n, 12);

const CHECK = {
  ownerId: USER,
  serverDate: noon(10),
  daysSinceLastExposure: 2,
  matchedKeyCount: 1,
  maximumRiskScore: 30,
  attenuationDurationMinutes: { high: 10, medium: 5, low: 0 },
  riskScoreSum: 30,
  status: CheckStatus.PENDING,
};

const UPLOAD_REQUEST = {
  token: { otp: "test-otp", serverDate: noon(14) },
  teks: [{ keyData: "dGVzdC1rZXktMQ==", rollingStartIntervalNumber: 2650000, rollingPeriod: 144 }],
};

describe("Exposure Cloud Functions", () => {
  let h: TestHarness;

  beforeEach(() => {
    h = createHarness();
    _testing.setExposureManager(h.manager);
  });

  afterAll(() => {
    _testing.setExposureManager(null);
  });

  describe("Test 1: processExposureCheck", () => {
    it("should run the check cycle and mark the check completed", async () => {
      const ref = { update: jest.fn().mockResolvedValue(undefined) };

      await handleExposureCheck("check-1", CHECK, ref);

      expect(ref.update).toHaveBeenNthCalledWith(1, { status: CheckStatus.PROCESSING });
      expect(ref.update).toHaveBeenNthCalledWith(2, {
        status: CheckStatus.COMPLETED,
        processedAt: expect.any(Number),
        qualifying: true,
        notified: true,
      });
      expect(await h.manager.getExposureStatus(USER)).toEqual(exposed(day(8), false));
      expect(h.notifier.notified).toEqual([USER]);
    });

    it("should pass the last processed chunk on", async () => {
      const ref = { update: jest.fn().mockResolvedValue(undefined) };

      await handleExposureCheck("check-1", { ...CHECK, lastProcessedChunk: 9 }, ref);

      expect(await h.reportingStore.getLastProcessedChunk(USER)).toBe(9);
    });

    it("should mark an invalid check failed without processing it", async () => {
      const ref = { update: jest.fn().mockResolvedValue(undefined) };

      await handleExposureCheck("check-2", { ...CHECK, ownerId: undefined }, ref);

      expect(ref.update).toHaveBeenLastCalledWith({
        status: CheckStatus.FAILED,
        error: "Missing or invalid ownerId",
      });
      expect(await h.manager.hasSummaries(USER)).toBe(false);
    });

    it("should mark the check failed when processing throws", async () => {
      const ref = { update: jest.fn().mockResolvedValue(undefined) };
      jest.spyOn(h.reportingStore, "addSummary").mockRejectedValueOnce(new Error("write failed"));

      await handleExposureCheck("check-3", CHECK, ref);

      expect(ref.update).toHaveBeenLastCalledWith({
        status: CheckStatus.FAILED,
        error: "write failed",
      });
    });
  });

  describe("Test 2: uploadExposureData", () => {
    const upload = handlerOf(uploadExposureData);

    it("should reject unauthenticated requests", async () => {
      await expect(upload(UPLOAD_REQUEST, createMockContext())).rejects.toMatchObject({
        code: "unauthenticated",
      });
    });

    it("should reject rate limited requests", async () => {
      mockFirestore.runTransaction.mockResolvedValueOnce(false);

      await expect(upload(UPLOAD_REQUEST, createMockContext(USER))).rejects.toMatchObject({
        code: "resource-exhausted",
      });
      expect(h.transport.payloads).toEqual([]);
    });

    it("should reject invalid requests", async () => {
      await expect(
        upload({ ...UPLOAD_REQUEST, token: { serverDate: noon(14) } }, createMockContext(USER)),
      ).rejects.toMatchObject({ code: "invalid-argument", message: "Missing or invalid otp/cun" });
    });

    it("should require a province", async () => {
      await expect(upload(UPLOAD_REQUEST, createMockContext(USER))).rejects.toMatchObject({
        code: "failed-precondition",
      });
    });

    it("should map a failed profile read to unavailable", async () => {
      h.profileStore.failWith = new Error("UNAVAILABLE");

      await expect(upload(UPLOAD_REQUEST, createMockContext(USER))).rejects.toMatchObject({
        code: "unavailable",
        message: "The user profile could not be read. Please try again later.",
      });
    });

    it("should map transport errors to unavailable", async () => {
      h.profileStore.provinces.set(USER, "RM");
      h.transport.failWith = new Error("network down");

      await expect(upload(UPLOAD_REQUEST, createMockContext(USER))).rejects.toMatchObject({
        code: "unavailable",
      });
    });

    it("should upload and report counts", async () => {
      h.profileStore.provinces.set(USER, "RM");
      await h.manager.processKeys(USER, noon(10), {
        daysSinceLastExposure: 2,
        matchedKeyCount: 1,
        maximumRiskScore: 30,
        attenuationDurationMinutes: { high: 10, medium: 5, low: 0 },
        riskScoreSum: 30,
      }, async () => []);

      const result = await upload(UPLOAD_REQUEST, createMockContext(USER));

      expect(result).toEqual({ success: true, uploadedSummaries: 1, uploadedInfos: 0 });
      expect(h.transport.payloads[0].token).toEqual({
        kind: "otp",
        otp: "test-otp",
        serverDate: noon(14),
      });
      expect(await h.manager.getExposureStatus(USER)).toEqual(positive());
    });
  });

  describe("Test 3: getExposureStatus and acknowledgeExposure", () => {
    const getStatus = handlerOf(getExposureStatus);
    const acknowledge = handlerOf(acknowledgeExposure);

    it("should reject unauthenticated requests", async () => {
      await expect(getStatus({}, createMockContext())).rejects.toMatchObject({
        code: "unauthenticated",
      });
    });

    it("should return NONE for a new user", async () => {
      expect(await getStatus({}, createMockContext(USER))).toEqual({
        status: { type: ExposureStatusType.NONE },
        hasSummaries: false,
        lastSuccessfulCheckDate: null,
      });
    });

    it("should acknowledge and return the exposure", async () => {
      await h.statusStore.setStatus(USER, exposed(day(8)));

      const result = await acknowledge({}, createMockContext(USER));

      expect(result).toEqual({
        success: true,
        status: { type: ExposureStatusType.EXPOSED, lastExposureDate: day(8), acknowledged: true },
      });
    });
  });

  describe("Test 4: updateCountriesOfInterest", () => {
    const updateCountries = handlerOf(updateCountriesOfInterest);

    it("should store normalized codes", async () => {
      const result = await updateCountries({ countries: ["de", "FR", "de"] }, createMockContext(USER));

      expect(result).toEqual({ success: true, countries: ["DE", "FR"] });
      expect(await h.reportingStore.getCountriesOfInterest(USER)).toEqual(["DE", "FR"]);
    });

    it("should reject invalid codes", async () => {
      await expect(
        updateCountries({ countries: ["Germany"] }, createMockContext(USER)),
      ).rejects.toMatchObject({ code: "invalid-argument", message: "Invalid country code: Germany" });
    });
  });

  describe("Test 5: Admin functions", () => {
    const reset = handlerOf(resetExposureStatus);
    const clear = handlerOf(clearExposureHistory);

    it("should require the admin claim", async () => {
      await expect(reset({ uid: USER }, createMockContext("someone"))).rejects.toMatchObject({
        code: "permission-denied",
      });
    });

    it("should require a target uid", async () => {
      await expect(reset({}, createMockContext("admin-1", true))).rejects.toMatchObject({
        code: "invalid-argument",
      });
    });

    it("should reset the target user's status", async () => {
      await h.statusStore.setStatus(USER, positive());

      const result = await reset({ uid: USER }, createMockContext("admin-1", true));

      expect(result).toEqual({ success: true });
      expect((await h.manager.getExposureStatus(USER)).type).toBe(ExposureStatusType.NONE);
    });

    it("should clear the target user's history", async () => {
      await h.reportingStore.addSummary(USER, {
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

      const result = await clear({ uid: USER }, createMockContext("admin-1", true));

      expect(result).toEqual({ success: true, summariesDeleted: 1 });
      expect(await h.manager.hasSummaries(USER)).toBe(false);
    });
  });
});
