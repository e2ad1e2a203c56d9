/**
 * In-memory collaborators for ExposureManager tests
 */

import {
  ExposureStatus,
  ExposureSummary,
  IngestionPayload,
  RiskPolicy,
} from "../types";
import {
  ExposureManager,
  ExposureNotifier,
  ExposureReportingStore,
  ExposureStatusStore,
  IngestionTransport,
  StatusUpdate,
  UserProfileStore,
  noExposure,
} from "../utils/exposure";

export const TEST_POLICY: RiskPolicy = {
  minimumRiskScore: 20,
  maxSummaryCount: 6,
  maxInfoCount: 14,
};

export class InMemoryStatusStore implements ExposureStatusStore {
  readonly statuses = new Map<string, ExposureStatus>();
  writes = 0;

  async getStatus(ownerId: string): Promise<ExposureStatus> {
    return this.statuses.get(ownerId) ?? noExposure();
  }

  async setStatus(ownerId: string, status: ExposureStatus): Promise<void> {
    this.writes++;
    this.statuses.set(ownerId, status);
  }

  async updateStatus<T>(
    ownerId: string,
    compute: (current: ExposureStatus) => StatusUpdate<T>,
  ): Promise<T> {
    const current = await this.getStatus(ownerId);
    // Yield so that unserialized callers would interleave here
    await new Promise((resolve) => setImmediate(resolve));
    const { status, result } = compute(current);
    if (status !== null) {
      await this.setStatus(ownerId, status);
    }
    return result;
  }
}

export class InMemoryReportingStore implements ExposureReportingStore {
  readonly summaries = new Map<string, ExposureSummary[]>();
  readonly countries = new Map<string, string[]>();
  readonly chunks = new Map<string, number | null>();
  readonly checkDates = new Map<string, number>();

  async addSummary(ownerId: string, summary: ExposureSummary): Promise<void> {
    this.summaries.set(ownerId, [...(this.summaries.get(ownerId) ?? []), summary]);
  }

  async getSummaries(ownerId: string): Promise<ExposureSummary[]> {
    return [...(this.summaries.get(ownerId) ?? [])];
  }

  async hasSummaries(ownerId: string): Promise<boolean> {
    return (this.summaries.get(ownerId) ?? []).length > 0;
  }

  async resetSummaries(ownerId: string): Promise<number> {
    const count = (this.summaries.get(ownerId) ?? []).length;
    this.summaries.delete(ownerId);
    return count;
  }

  async getCountriesOfInterest(ownerId: string): Promise<string[]> {
    return [...(this.countries.get(ownerId) ?? [])];
  }

  async setCountriesOfInterest(ownerId: string, countries: string[]): Promise<void> {
    this.countries.set(ownerId, [...countries]);
  }

  async getLastProcessedChunk(ownerId: string): Promise<number | null> {
    return this.chunks.get(ownerId) ?? null;
  }

  async setLastProcessedChunk(ownerId: string, chunk: number | null): Promise<void> {
    this.chunks.set(ownerId, chunk);
  }

  async getLastSuccessfulCheckDate(ownerId: string): Promise<number | null> {
    return this.checkDates.get(ownerId) ?? null;
  }

  async setLastSuccessfulCheckDate(ownerId: string, date: number): Promise<void> {
    this.checkDates.set(ownerId, date);
  }
}

export class InMemoryProfileStore implements UserProfileStore {
  readonly provinces = new Map<string, string>();
  failWith: Error | null = null;

  async getProvince(ownerId: string): Promise<string | null> {
    if (this.failWith) {
      throw this.failWith;
    }
    return this.provinces.get(ownerId) ?? null;
  }
}

export class RecordingNotifier implements ExposureNotifier {
  readonly notified: string[] = [];
  failWith: Error | null = null;

  async notifyExposure(ownerId: string): Promise<boolean> {
    if (this.failWith !== null) {
      throw this.failWith;
    }
    this.notified.push(ownerId);
    return true;
  }
}

export class RecordingTransport implements IngestionTransport {
  readonly payloads: IngestionPayload[] = [];
  accept = true;
  failWith: Error | null = null;

  async uploadTeks(payload: IngestionPayload): Promise<boolean> {
    if (this.failWith !== null) {
      throw this.failWith;
    }
    this.payloads.push(payload);
    return this.accept;
  }
}

export interface TestHarness {
  manager: ExposureManager;
  statusStore: InMemoryStatusStore;
  reportingStore: InMemoryReportingStore;
  profileStore: InMemoryProfileStore;
  notifier: RecordingNotifier;
  transport: RecordingTransport;
  setPolicy(policy: RiskPolicy | null): void;
}

export function createHarness(): TestHarness {
  const statusStore = new InMemoryStatusStore();
  const reportingStore = new InMemoryReportingStore();
  const profileStore = new InMemoryProfileStore();
  const notifier = new RecordingNotifier();
  const transport = new RecordingTransport();
  let policy: RiskPolicy | null = TEST_POLICY;

  const manager = new ExposureManager({
    statusStore,
    reportingStore,
    profileStore,
    notifier,
    transport,
    getPolicy: () => policy,
  });

  return {
    manager,
    statusStore,
    reportingStore,
    profileStore,
    notifier,
    transport,
    setPolicy: (next) => {
      policy = next;
    },
  };
}
