import { Injectable } from '@nestjs/common';
import { EquitySnapshot } from './entities/equity-snapshot.entity';
import { DayKey } from '../common/utils/date.util';

// Equity curve rows keyed by (sandboxId, date).
// Insert-or-replace: a second write for the same day overwrites the first.
@Injectable()
export class SnapshotStorageService {
  private snapshots: Map<string, Map<DayKey, EquitySnapshot>> = new Map();

  upsertSnapshot(snapshot: EquitySnapshot): EquitySnapshot {
    let byDate = this.snapshots.get(snapshot.sandboxId);
    if (!byDate) {
      byDate = new Map();
      this.snapshots.set(snapshot.sandboxId, byDate);
    }
    byDate.set(snapshot.date, { ...snapshot });
    return { ...snapshot };
  }

  /** Ordered by date, oldest first */
  readSnapshots(sandboxId: string): EquitySnapshot[] {
    const byDate = this.snapshots.get(sandboxId);
    if (!byDate) {
      return [];
    }
    return Array.from(byDate.values())
      .sort((a, b) => a.date.localeCompare(b.date))
      .map((s) => ({ ...s }));
  }

  deleteSnapshots(sandboxId: string): void {
    this.snapshots.delete(sandboxId);
  }

  /** Nukes all storage - test harness only */
  clearAllData(): void {
    this.snapshots.clear();
  }
}
