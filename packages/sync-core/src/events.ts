export type SyncEvent =
  | {
      type: 'document_repaired';
      path: string;
      sourceVersion: number;
      notices: string[];
    }
  | {
      type: 'conflicts_resolved';
      path: string;
      status: 'merged' | 'fallback_newest';
      versionCount: number;
    }
  | {
      /**
       * At least one conflict version could not be decoded; its changes are
       * not in the surviving file.
       */
      type: 'conflict_resolution_degraded';
      path: string;
      skippedVersionIds: string[];
      fallback: boolean;
    }
  | {
      type: 'concurrency_race_resolved';
      path: string;
    };

export type SyncEventListener = (event: SyncEvent) => void;
