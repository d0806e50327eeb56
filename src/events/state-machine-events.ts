export interface StateTransitionEvent {
  owner: string;
  tableName: string;
  recordId: string;
  fromState: string;
  toState: string;
  event: string;
  args: readonly unknown[];
  timestamp: Date;
}

export interface StateInitializedEvent {
  owner: string;
  tableName: string;
  recordId: string;
  state: string;
  timestamp: Date;
}
