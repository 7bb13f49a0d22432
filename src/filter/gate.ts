/**
 * Decides whether the pipeline may continue past content filtering.
 *
 * blocked   → never proceeds
 * flagged   → proceeds only with an explicit override
 * warning   → proceeds, with the detected issues noted
 * compliant → proceeds
 */

import type { ComplianceStatus } from "../config/rules/enums.js";
import type { ContentFilterResult } from "../types/results.js";

export type GateDecision = "proceed" | "review" | "blocked";

export interface GateOutcome {
  readonly decision: GateDecision;
  readonly canProceed: boolean;
  /** Whether proceeding took (or would take) an override */
  readonly requiresOverride: boolean;
  readonly reason: string;
}

export interface GateOptions {
  /** Reviewer accepted the flagged content */
  override?: boolean;
}

export function evaluateGate(
  result: Pick<ContentFilterResult, "overallCompliance">,
  options: GateOptions = {}
): GateOutcome {
  const override = options.override ?? false;
  const status: ComplianceStatus = result.overallCompliance;

  switch (status) {
    case "blocked":
      return {
        decision: "blocked",
        canProceed: false,
        requiresOverride: false,
        reason: "Content is blocked by critical policy issues and cannot be converted",
      };
    case "flagged":
      return {
        decision: "review",
        canProceed: override,
        requiresOverride: true,
        reason: override
          ? "Proceeding with flagged content on reviewer override"
          : "Content is flagged; review the detected issues or override to continue",
      };
    case "warning":
      return {
        decision: "proceed",
        canProceed: true,
        requiresOverride: false,
        reason: "Content has warnings; proceeding with the detected issues noted",
      };
    case "compliant":
      return {
        decision: "proceed",
        canProceed: true,
        requiresOverride: false,
        reason: "Content passed all policy checks",
      };
  }
}
