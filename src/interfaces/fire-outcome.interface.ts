export interface NoMatchOutcome {
  status: 'no_match';
  event: string;
  state: string;
}

export interface AppliedOutcome {
  status: 'applied';
  event: string;
  fromState: string;
  toState: string;
}

export interface RejectedOutcome {
  status: 'rejected';
  event: string;
  error: Error;
}

export type FireOutcome = NoMatchOutcome | AppliedOutcome | RejectedOutcome;
