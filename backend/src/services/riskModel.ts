import { InfrastructureError } from "../models/errors";
import { VitalRecord } from "../models/types";

export interface RiskFeatures {
  readingsUsed: number;
  averageHeartRate: number;
  averageSpo2: number | null;
  averageSystolic: number | null;
  heartRateTrend: number;
}

export type RiskLevel = "low" | "moderate" | "high";

/**
 * Scoring backend held by the application context. `load` runs once at
 * start-up and `unload` at shutdown; `predict` must not be called in between.
 */
export interface RiskModel {
  readonly name: string;
  load(): Promise<void>;
  predict(features: RiskFeatures): number;
  unload(): Promise<void>;
}

function clamp(value: number, min = 0, max = 1): number {
  return Math.max(min, Math.min(max, value));
}

function avg(values: number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function normalize(value: number, base: number): number {
  if (base === 0) {
    return 0;
  }
  return clamp(value / base);
}

function present(values: Array<number | null>): number[] {
  return values.filter((value): value is number => value !== null);
}

/** Readings are expected oldest first, as the vitals history returns them. */
export function buildRiskFeatures(readings: VitalRecord[]): RiskFeatures {
  const heartRates = readings.map((reading) => reading.heartRate);
  return {
    readingsUsed: readings.length,
    averageHeartRate: avg(heartRates) ?? 0,
    averageSpo2: avg(present(readings.map((reading) => reading.spo2))),
    averageSystolic: avg(present(readings.map((reading) => reading.systolicBp))),
    heartRateTrend: heartRates.length > 2 ? heartRates[heartRates.length - 1] - heartRates[0] : 0
  };
}

export function riskLevel(score: number): RiskLevel {
  if (score >= 0.65) {
    return "high";
  }
  if (score >= 0.35) {
    return "moderate";
  }
  return "low";
}

/** Weighted vital-sign heuristic; stands in for a trained model. */
export class HeuristicRiskModel implements RiskModel {
  readonly name = "heuristic-v1";
  private loaded = false;

  async load(): Promise<void> {
    this.loaded = true;
  }

  predict(features: RiskFeatures): number {
    if (!this.loaded) {
      throw new InfrastructureError("Risk model used before it was loaded.");
    }
    if (features.readingsUsed === 0) {
      return 0;
    }

    const elevatedHr = normalize(features.averageHeartRate - 75, 45);
    const lowOxygen = features.averageSpo2 === null ? 0 : normalize(97 - features.averageSpo2, 8);
    const highPressure = features.averageSystolic === null ? 0 : normalize(features.averageSystolic - 120, 40);
    const risingHrTrend = normalize(features.heartRateTrend, 25);

    const score = clamp(elevatedHr * 0.35 + lowOxygen * 0.3 + highPressure * 0.25 + risingHrTrend * 0.1);
    return Number(score.toFixed(2));
  }

  async unload(): Promise<void> {
    this.loaded = false;
  }
}
