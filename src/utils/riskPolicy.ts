/**
 * Risk Policy Reader
 * Reads the qualification threshold and upload caps from the policy
 * configuration file (config/riskPolicy.json, or RISK_POLICY_PATH).
 *
 * Unlike most configuration, there is no built-in fallback: when the file
 * cannot be loaded the policy is reported as unavailable and callers fail
 * closed (checks do not qualify, uploads are refused).
 */

import * as fs from "fs";
import * as path from "path";
import { RiskPolicy } from "../types";
import { logError, logWarn } from "./logger";

/**
 * Cached policy to avoid repeated file reads
 */
let cachedPolicy: RiskPolicy | null = null;

/**
 * Resolve the configuration file location
 */
function getPolicyPath(): string {
  return process.env.RISK_POLICY_PATH ?? path.resolve(__dirname, "../../config/riskPolicy.json");
}

function isPlainObject(value: unknown): value is { [key: string]: unknown } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

/**
 * Validates the parsed configuration has the required structure
 *
 * @param config The parsed configuration
 * @throws Error if configuration is invalid
 */
function validatePolicy(config: unknown): RiskPolicy {
  if (!isPlainObject(config)) {
    throw new Error("Risk policy must be an object");
  }

  const { minimumRiskScore, maxSummaryCount, maxInfoCount } = config;

  if (!isNonNegativeInteger(minimumRiskScore)) {
    throw new Error("Invalid minimumRiskScore in risk policy");
  }
  if (!isNonNegativeInteger(maxSummaryCount)) {
    throw new Error("Invalid maxSummaryCount in risk policy");
  }
  if (!isNonNegativeInteger(maxInfoCount)) {
    throw new Error("Invalid maxInfoCount in risk policy");
  }

  return { minimumRiskScore, maxSummaryCount, maxInfoCount };
}

/**
 * Loads the risk policy from the configuration file.
 * A successfully loaded policy is cached; failures are retried on the next call.
 *
 * @returns The risk policy, or null when it is unavailable
 */
export function loadRiskPolicy(): RiskPolicy | null {
  if (cachedPolicy !== null) {
    return cachedPolicy;
  }

  const policyPath = getPolicyPath();

  if (!fs.existsSync(policyPath)) {
    logWarn(`Risk policy file not found at ${policyPath}`);
    return null;
  }

  try {
    const content = fs.readFileSync(policyPath, "utf-8");
    cachedPolicy = validatePolicy(JSON.parse(content));
    return cachedPolicy;
  } catch (error) {
    logError(`Error loading risk policy from ${policyPath}:`, error);
    return null;
  }
}

/**
 * Clears the cached policy.
 * Useful for testing to ensure fresh config is loaded.
 */
export function clearRiskPolicyCache(): void {
  cachedPolicy = null;
}

/**
 * Exports for testing purposes
 */
export const _testing = {
  getPolicyPath,
  validatePolicy,
};
