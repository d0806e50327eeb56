import { DiscoveryService, Reflector } from '@nestjs/core';
import { EventEmitter2 } from '@nestjs/event-emitter';
import type { TransitionInput } from '../src/definitions/conditional-callback';
import type { IStateDbAdapter } from '../src/interfaces/state-db-adapter.interface';
import { StateMachineManager } from '../src/services/state-machine-manager.service';
import { StateMachineRegistry } from '../src/services/state-machine-registry.service';

export function createRegistry(
  options: { recordChanges?: boolean } = {},
): StateMachineRegistry {
  const mockDiscovery = {
    getProviders: () => [],
  } as unknown as DiscoveryService;
  const mockReflector = { get: () => undefined } as unknown as Reflector;
  return new StateMachineRegistry(mockDiscovery, mockReflector, {
    entities: [],
    recordChanges: options.recordChanges ?? true,
  });
}

export function createManager(
  registry: StateMachineRegistry,
  adapter: IStateDbAdapter,
  eventEmitter: EventEmitter2 = new EventEmitter2(),
): StateMachineManager {
  return new StateMachineManager(registry, adapter, eventEmitter, {
    emitEvents: true,
  });
}

export function createMockAdapter(): jest.Mocked<IStateDbAdapter> {
  const mockAdapter: jest.Mocked<IStateDbAdapter> = {
    findOne: jest.fn().mockResolvedValue(null),
    insert: jest.fn().mockResolvedValue(undefined),
    compareAndSetState: jest.fn().mockResolvedValue(true),
    insertStateChange: jest.fn().mockResolvedValue(undefined),
    findStateChanges: jest.fn().mockResolvedValue([]),
    hasStateChanges: jest.fn().mockResolvedValue(false),
    findByState: jest.fn().mockResolvedValue([]),
    countByState: jest.fn().mockResolvedValue(0),
    transaction: jest.fn().mockImplementation(async (cb) => cb(mockAdapter)),
  };
  return mockAdapter;
}

export class Vehicle {
  state?: string | null;
  seatbelt = false;
  readonly calls: string[] = [];

  constructor(public readonly id: string) {}

  seatbeltOn(): boolean {
    return this.seatbelt;
  }

  putOnSeatbelt(input: TransitionInput): void {
    this.seatbelt = true;
    this.calls.push(`putOnSeatbelt:${input.fromState}->${input.toState}`);
  }
}

export class Car extends Vehicle {}

/**
 * parked --ignite--> idling --shift_up--> first_gear (needs seatbelt)
 * park: idling | first_gear -> parked
 */
export function registerVehicle(
  registry: StateMachineRegistry,
  options: { recordChanges?: boolean } = {},
): void {
  registry.register(Vehicle, {
    tableName: 'vehicles',
    initial: 'parked',
    recordChanges: options.recordChanges,
    catalog: {
      states: ['parked', 'idling', 'first_gear', 'stalled'],
      events: ['ignite', 'shift_up', 'park', 'crash'],
    },
    define: (machine) =>
      machine
        .state(['parked', 'idling', 'first_gear', 'stalled'])
        .event('ignite', (event) => event.transitionTo('idling', { from: 'parked' }))
        .event('shift_up', (event) =>
          event.transitionTo('first_gear', { from: 'idling', if: 'seatbeltOn' }),
        )
        .event('park', (event) =>
          event.transitionTo('parked', { from: ['idling', 'first_gear'] }),
        ),
  });
}
