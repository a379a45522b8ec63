import { v4 as uuidv4 } from "uuid";
import { DataStore } from "../data/repositories";
import { Logger } from "../logger";
import { AlertRecord, VitalReading, VitalRecord } from "../models/types";
import { Clock, daysBefore } from "../utils/time";
import { AlertEngine } from "./alertEngine";

export const MAX_BATCH_READINGS = 1000;

export interface IngestResult {
  record: VitalRecord;
  alerts: AlertRecord[];
}

export interface BatchIngestResult {
  recordsCreated: number;
  alertsCreated: number;
}

export interface VitalsSummary {
  periodDays: number;
  totalReadings: number;
  avgHeartRate: number | null;
  minHeartRate: number | null;
  maxHeartRate: number | null;
  avgSpo2: number | null;
  minSpo2: number | null;
  alertsTriggered: number;
}

function average(values: number[]): number | null {
  return values.length === 0 ? null : values.reduce((sum, value) => sum + value, 0) / values.length;
}

export interface VitalsServiceDeps {
  store: DataStore;
  alerts: AlertEngine;
  clock: Clock;
  logger: Logger;
}

export class VitalsService {
  constructor(private readonly deps: VitalsServiceDeps) {}

  /** The reading and the alerts it raises are committed together or not at all. */
  ingest(subjectId: string, reading: VitalReading): IngestResult {
    const result = this.deps.store.transaction(() => this.writeReading(subjectId, reading));
    this.deps.logger.debug(
      { subjectId, readingId: result.record.id, alertsCreated: result.alerts.length },
      "Vital reading stored"
    );
    return result;
  }

  ingestBatch(subjectId: string, readings: VitalReading[]): BatchIngestResult {
    const results = this.deps.store.transaction(() =>
      readings.map((reading) => this.writeReading(subjectId, reading))
    );
    const alertsCreated = results.reduce((sum, result) => sum + result.alerts.length, 0);
    this.deps.logger.info({ subjectId, recordsCreated: results.length, alertsCreated }, "Vital batch stored");
    return { recordsCreated: results.length, alertsCreated };
  }

  // Both reads stop at the current time.
  latest(subjectId: string): VitalRecord | undefined {
    return this.deps.store.vitals.latest(subjectId, this.deps.clock.now().toISOString());
  }

  history(subjectId: string, days: number): VitalRecord[] {
    const now = this.deps.clock.now();
    return this.deps.store.vitals.listBetween(subjectId, daysBefore(now, days).toISOString(), now.toISOString());
  }

  summary(subjectId: string, days: number): VitalsSummary {
    const readings = this.history(subjectId, days);
    const heartRates = readings.map((reading) => reading.heartRate);
    const spo2Values = readings
      .map((reading) => reading.spo2)
      .filter((value): value is number => value !== null);

    const since = daysBefore(this.deps.clock.now(), days).getTime();
    const alertsTriggered = this.deps.store.alerts
      .listBySubject(subjectId, { includeInactive: true })
      .filter((alert) => alert.type !== "ConsentDisableRequest" && Date.parse(alert.createdAt) >= since).length;

    return {
      periodDays: days,
      totalReadings: readings.length,
      avgHeartRate: average(heartRates),
      minHeartRate: heartRates.length > 0 ? Math.min(...heartRates) : null,
      maxHeartRate: heartRates.length > 0 ? Math.max(...heartRates) : null,
      avgSpo2: average(spo2Values),
      minSpo2: spo2Values.length > 0 ? Math.min(...spo2Values) : null,
      alertsTriggered
    };
  }

  private writeReading(subjectId: string, reading: VitalReading): IngestResult {
    const record = this.deps.store.vitals.insert({
      ...reading,
      id: uuidv4(),
      subjectId,
      createdAt: this.deps.clock.now().toISOString()
    });
    return { record, alerts: this.deps.alerts.evaluate(subjectId, reading) };
  }
}
