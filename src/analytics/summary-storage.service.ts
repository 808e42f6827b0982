import { Injectable } from '@nestjs/common';
import { AnalysisSnapshot } from './entities/analysis-snapshot.entity';

// In-memory snapshot store.
// Latest snapshot serves reads; earlier ones are kept as history.
@Injectable()
export class SummaryStorageService {
  private snapshots: AnalysisSnapshot[] = [];

  saveSnapshot(snapshot: AnalysisSnapshot): AnalysisSnapshot {
    this.snapshots.push(snapshot);
    return snapshot;
  }

  /** Most recent run, undefined before the first one */
  getLatestSnapshot(): AnalysisSnapshot | undefined {
    return this.snapshots[this.snapshots.length - 1];
  }

  /** All runs, oldest first */
  getSnapshots(): AnalysisSnapshot[] {
    return [...this.snapshots];
  }

  clearAllData(): void {
    this.snapshots = [];
  }
}
