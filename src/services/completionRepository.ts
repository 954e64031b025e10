import type { CalendarDay, CompletionRecord, TrackablePrayerId } from "../types";

/** Storage of completion records keyed by (prayerId, date). */
export interface CompletionRepository {
  get(prayerId: TrackablePrayerId, date: CalendarDay): Promise<CompletionRecord | null>;
  /** Inserts or replaces the record for its (prayerId, date). */
  upsert(record: CompletionRecord): Promise<void>;
  /** Records with `from <= date <= to`, oldest first. */
  listRange(from: CalendarDay, to: CalendarDay): Promise<CompletionRecord[]>;
  listForPrayer(prayerId: TrackablePrayerId): Promise<CompletionRecord[]>;
}

function byDate(a: CompletionRecord, b: CompletionRecord): number {
  return a.date.localeCompare(b.date);
}

export class InMemoryCompletionRepository implements CompletionRepository {
  private records = new Map<string, CompletionRecord>();

  constructor(initial: CompletionRecord[] = []) {
    for (const record of initial) {
      this.records.set(this.key(record.prayerId, record.date), { ...record });
    }
  }

  async get(prayerId: TrackablePrayerId, date: CalendarDay): Promise<CompletionRecord | null> {
    const record = this.records.get(this.key(prayerId, date));
    return record ? { ...record } : null;
  }

  async upsert(record: CompletionRecord): Promise<void> {
    this.records.set(this.key(record.prayerId, record.date), { ...record });
  }

  async listRange(from: CalendarDay, to: CalendarDay): Promise<CompletionRecord[]> {
    return [...this.records.values()]
      .filter((record) => record.date >= from && record.date <= to)
      .map((record) => ({ ...record }))
      .sort(byDate);
  }

  async listForPrayer(prayerId: TrackablePrayerId): Promise<CompletionRecord[]> {
    return [...this.records.values()]
      .filter((record) => record.prayerId === prayerId)
      .map((record) => ({ ...record }))
      .sort(byDate);
  }

  private key(prayerId: TrackablePrayerId, date: CalendarDay): string {
    return `${prayerId}:${date}`;
  }
}
