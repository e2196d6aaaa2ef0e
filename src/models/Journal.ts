export const OPERATION_KINDS = ['create', 'update', 'add', 'remove', 'match-fail', 'link', 'like'] as const;

export type OperationKind = typeof OPERATION_KINDS[number];

export type OperationOutcome = 'success' | 'failure';

export interface JournalPlaylistRef {
  targetId: string;
  targetName: string;
  sourceId?: string;
  sourceName?: string;
}

export interface JournalTrackRef {
  sourceId?: string;
  targetId?: string;
  label?: string;
}

export interface JournalEntry {
  timestamp: string;
  kind: OperationKind;
  playlist: JournalPlaylistRef;
  track: JournalTrackRef | null;
  outcome: OperationOutcome;
  detail?: string;
}

export interface PlaylistHistory {
  targetId: string;
  targetName: string;
  sourceId?: string;
  sourceName?: string;
  lastUpdated: string;
  entries: JournalEntry[];
}

export interface JournalStats {
  totalOperations: number;
  successfulOperations: number;
  failedOperations: number;
  lastOperation: string | null;
  operationsByKind: Record<OperationKind, number>;
  playlists: Map<string, PlaylistHistory>;
}
