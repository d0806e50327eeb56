import { createStateChangeRecorder } from '../../src/recorders/state-change-recorder';
import { createMockAdapter } from '../helpers';

const record = { id: 'v1', state: 'idling' };

describe('createStateChangeRecorder', () => {
  it('should return a no-op recorder when recording is off', async () => {
    const adapter = createMockAdapter();
    const recorder = createStateChangeRecorder({
      tableName: 'vehicles',
      recordChanges: false,
    });

    await recorder.append(adapter, record, {
      fromState: 'parked',
      toState: 'idling',
      event: 'ignite',
    });

    expect(recorder.enabled).toBe(false);
    await expect(recorder.hasEntries(adapter, record)).resolves.toBe(false);
    await expect(recorder.historyOf(adapter, record)).resolves.toEqual([]);
    expect(adapter.insertStateChange).not.toHaveBeenCalled();
    expect(adapter.hasStateChanges).not.toHaveBeenCalled();
  });

  it('should write through the adapter it is handed when recording is on', async () => {
    const adapter = createMockAdapter();
    adapter.hasStateChanges.mockResolvedValueOnce(true);
    const recorder = createStateChangeRecorder({
      tableName: 'vehicles',
      recordChanges: true,
    });

    await recorder.append(adapter, record, {
      fromState: null,
      toState: 'parked',
      event: null,
    });

    expect(recorder.enabled).toBe(true);
    expect(adapter.insertStateChange).toHaveBeenCalledWith('vehicles', {
      recordId: 'v1',
      fromState: null,
      toState: 'parked',
      event: null,
    });
    await expect(recorder.hasEntries(adapter, record)).resolves.toBe(true);
    expect(adapter.hasStateChanges).toHaveBeenCalledWith('vehicles', 'v1');
  });

  it('should read history from the adapter', async () => {
    const adapter = createMockAdapter();
    const change = {
      id: 'c1',
      recordId: 'v1',
      fromState: null,
      toState: 'parked',
      event: null,
      occurredAt: new Date(0),
    };
    adapter.findStateChanges.mockResolvedValueOnce([change]);
    const recorder = createStateChangeRecorder({
      tableName: 'vehicles',
      recordChanges: true,
    });

    await expect(recorder.historyOf(adapter, record)).resolves.toEqual([change]);
    expect(adapter.findStateChanges).toHaveBeenCalledWith('vehicles', 'v1');
  });
});
