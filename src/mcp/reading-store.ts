/**
 * Readings produced by tool runs, kept so the resource link returned with a
 * report resolves to the same reading. Oldest entries are evicted first.
 */
import { randomUUID } from "node:crypto";
import type { WeatherReading } from "../services/weather.service.js";

export type StoredReading = {
  runId: string;
  city: string;
  reading: WeatherReading;
};

export const DEFAULT_READING_CAPACITY = 256;

export class ReadingStore {
  private entries = new Map<string, StoredReading>();

  constructor(private capacity: number = DEFAULT_READING_CAPACITY) {}

  add(city: string, reading: WeatherReading): StoredReading {
    const entry = { runId: randomUUID(), city, reading };
    this.entries.set(entry.runId, entry);

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    return entry;
  }

  get(runId: string): StoredReading | undefined {
    return this.entries.get(runId);
  }
}
