export enum StateMachineEventType {
  TRANSITION = 'state.transition',
  INITIALIZED = 'state.initialized',
}
