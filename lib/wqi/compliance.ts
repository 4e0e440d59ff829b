// lib/wqi/compliance.ts
// Batch averages checked against the outdoor bathing criteria.

import { summarizeBatch, type SampleOutcome } from "./batch";
import { BATHING_CRITERIA } from "./constants";
import type { PollutionStatus } from "./types";

export type ComplianceStatus = "COMPLIANT" | "NON-COMPLIANT";

export interface ParameterCompliance {
  average: number;
  compliant: boolean;
  status: ComplianceStatus;
}

export interface ComplianceReport {
  reportDate: string;
  totalRecords: number;
  statusDistribution: Partial<Record<PollutionStatus, number>>;
  compliance: {
    ph?: ParameterCompliance;
    dissolvedOxygen?: ParameterCompliance;
    bod?: ParameterCompliance;
  };
  recommendations: string[];
}

export const RECOMMENDATIONS = {
  ph: "pH levels require adjustment - implement water treatment protocols",
  dissolvedOxygen: "Dissolved oxygen below recommended levels - increase aeration",
  bod: "BOD above bathing limit - trace and treat upstream organic discharge",
  allClear: "All parameters within safe limits - continue regular monitoring",
} as const;

function check(average: number, compliant: boolean): ParameterCompliance {
  return { average, compliant, status: compliant ? "COMPLIANT" : "NON-COMPLIANT" };
}

export function complianceReport(
  outcomes: readonly SampleOutcome[],
  now: Date = new Date()
): ComplianceReport {
  const summary = summarizeBatch(outcomes);
  const { ph, dissolvedOxygen, bod } = summary.parameterStatistics;
  const compliance: ComplianceReport["compliance"] = {};

  if (ph) {
    compliance.ph = check(
      ph.average,
      ph.average >= BATHING_CRITERIA.phMin && ph.average <= BATHING_CRITERIA.phMax
    );
  }
  if (dissolvedOxygen) {
    compliance.dissolvedOxygen = check(
      dissolvedOxygen.average,
      dissolvedOxygen.average >= BATHING_CRITERIA.doMin
    );
  }
  if (bod) {
    compliance.bod = check(bod.average, bod.average <= BATHING_CRITERIA.bodMax);
  }

  const recommendations: string[] = [];
  if (compliance.ph?.compliant === false) recommendations.push(RECOMMENDATIONS.ph);
  if (compliance.dissolvedOxygen?.compliant === false) {
    recommendations.push(RECOMMENDATIONS.dissolvedOxygen);
  }
  if (compliance.bod?.compliant === false) recommendations.push(RECOMMENDATIONS.bod);
  if (recommendations.length === 0) recommendations.push(RECOMMENDATIONS.allClear);

  return {
    reportDate: now.toISOString(),
    totalRecords: summary.total,
    statusDistribution: summary.statusDistribution,
    compliance,
    recommendations,
  };
}
