export interface StatefulRow {
  id: string;
  state: string;
  updatedAt: Date;
}

export interface StateChangeRecord {
  id: string;
  recordId: string;
  /** `null` only for the entry written when a record enters its initial state. */
  fromState: string | null;
  toState: string;
  /** `null` only for the initial-state entry. */
  event: string | null;
  occurredAt: Date;
}

export type NewStateChange = Omit<StateChangeRecord, 'id' | 'occurredAt'>;
