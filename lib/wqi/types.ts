// lib/wqi/types.ts

export interface ParameterReading {
  ph: number;
  /** Biochemical oxygen demand, mg/L */
  bod: number;
  /** mg/L */
  dissolvedOxygen: number;
  /** MPN/100mL, must be above zero */
  fecalColiform: number;
  /** °C, defaults to 25 */
  waterTemperature?: number;
}

export type ResolvedReading = Readonly<Required<ParameterReading>>;

export interface ScoredParameters {
  ph: number;
  bod: number;
  dissolvedOxygen: number;
  fecalColiform: number;
}

export type Classification =
  | "Good to Excellent"
  | "Medium to Good"
  | "Bad"
  | "Bad to Very Bad";

export type CpcbClass = "A" | "B" | "C" | "D/E";

export type MpcbClass = "A-I" | "A-II" | "A-III" | "A-IV";

export type PollutionStatus = "Non Polluted" | "Polluted" | "Heavily Polluted";

export interface WQIBand {
  readonly classification: Classification;
  readonly cpcbClass: CpcbClass;
  readonly status: PollutionStatus;
}

export interface WQIResult {
  readonly compositeScore: number;
  readonly subIndices: Readonly<ScoredParameters>;
  readonly weightedIndices: Readonly<ScoredParameters>;
  readonly classification: Classification;
  readonly cpcbClass: CpcbClass;
  readonly mpcbClass: MpcbClass;
  readonly status: PollutionStatus;
  readonly warnings: readonly string[];
  readonly reading: ResolvedReading;
}

export interface WQIResultJson {
  wqi: number;
  subIndices: ScoredParameters;
  weightedIndices: ScoredParameters;
  classification: Classification;
  cpcbClass: CpcbClass;
  mpcbClass: MpcbClass;
  status: PollutionStatus;
  warnings: string[];
}
