import 'reflect-metadata';
import { Injectable, Module } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { InMemoryStateAdapter } from '../../src/adapters/in-memory-state.adapter';
import { Stateful } from '../../src/decorators/stateful.decorator';
import { StateMachineManager } from '../../src/services/state-machine-manager.service';
import { StateMachineRegistry } from '../../src/services/state-machine-registry.service';
import { StateMachineModule } from '../../src/state-machine.module';
import {
  STATE_DB_ADAPTER,
  STATE_MACHINE_MODULE_OPTIONS,
} from '../../src/state-machine.constants';
import { createMockAdapter } from '../helpers';

@Stateful<Shipment>({
  initial: 'packed',
  catalog: { states: ['packed', 'shipped'], events: ['ship'] },
  define: (machine) =>
    machine
      .state(['packed', 'shipped'])
      .event('ship', (event) => event.transitionTo('shipped', { from: 'packed' })),
})
@Injectable()
class Shipment {
  id = 's1';
  state?: string | null;
}

@Stateful<ExpressShipment>({
  tableName: 'express_shipments',
  catalog: { states: ['delivered'], events: ['deliver'] },
  define: (machine) =>
    machine
      .state('delivered')
      .event('deliver', (event) =>
        event.transitionTo('delivered', { from: 'shipped' }),
      ),
})
@Injectable()
class ExpressShipment extends Shipment {}

class FreightShipment extends Shipment {}

@Stateful<Parcel>({
  initial: 'received',
  recordChanges: false,
  catalog: { states: ['received'] },
  define: (machine) => machine.state('received'),
})
class Parcel {
  id = 'p1';
  state?: string | null;
}

describe('StateMachineModule integration', () => {
  let module: TestingModule;

  afterEach(async () => {
    if (module) {
      await module.close();
    }
  });

  it('should register decorated providers and listed entities on init', async () => {
    module = await Test.createTestingModule({
      imports: [
        StateMachineModule.forRoot({
          adapter: createMockAdapter(),
          entities: [FreightShipment, Parcel],
        }),
      ],
      providers: [ExpressShipment, Shipment],
    }).compile();

    await module.init();

    const registry = module.get(StateMachineRegistry);
    const shipment = registry.getOrThrow(Shipment);
    expect(shipment.tableName).toBe('shipments');
    expect(shipment.parent).toBeNull();

    const express = registry.getOrThrow(ExpressShipment);
    expect(express.parent).toBe(Shipment);
    expect(express.tableName).toBe('express_shipments');
    expect(express.initial).toBe('packed');
    expect([...express.events.keys()]).toEqual(['ship', 'deliver']);
    expect(registry.isActiveEvent(Shipment, 'deliver')).toBe(false);

    const freight = registry.getOrThrow(FreightShipment);
    expect(freight.parent).toBe(Shipment);
    expect(freight.tableName).toBe('shipments');

    expect(registry.getOrThrow(Parcel).recordChanges).toBe(false);
  });

  it('should provide the manager wired to the adapter', async () => {
    const adapter = new InMemoryStateAdapter();
    module = await Test.createTestingModule({
      imports: [StateMachineModule.forRoot({ adapter })],
      providers: [Shipment],
    }).compile();
    await module.init();

    const manager = module.get(StateMachineManager);
    const shipment = await manager.create(new Shipment());
    await manager.fire(shipment, 'ship');

    expect(module.get(STATE_DB_ADAPTER)).toBe(adapter);
    expect((await adapter.findOne('shipments', 's1'))?.state).toBe('shipped');
  });

  it('should resolve defaults into the module options', async () => {
    module = await Test.createTestingModule({
      imports: [StateMachineModule.forRoot({ adapter: createMockAdapter() })],
    }).compile();

    expect(module.get(STATE_MACHINE_MODULE_OPTIONS)).toEqual({
      entities: [],
      recordChanges: true,
      emitEvents: true,
    });
  });

  it('should support forRootAsync with injected dependencies', async () => {
    const adapter = createMockAdapter();

    @Module({
      providers: [{ provide: 'STATE_STORE', useValue: adapter }],
      exports: ['STATE_STORE'],
    })
    class StoreModule {}

    module = await Test.createTestingModule({
      imports: [
        StateMachineModule.forRootAsync({
          imports: [StoreModule],
          useFactory: (store) => ({
            adapter: createMockAdapter(),
            entities: [Parcel],
            emitEvents: store !== adapter,
          }),
          inject: ['STATE_STORE'],
        }),
      ],
    }).compile();
    await module.init();

    expect(module.get(STATE_MACHINE_MODULE_OPTIONS)).toEqual({
      entities: [Parcel],
      recordChanges: true,
      emitEvents: false,
    });
    expect(module.get(StateMachineRegistry).get(Parcel)).toBeDefined();
  });
});
