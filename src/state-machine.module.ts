import { DynamicModule, Module } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { StateMachineManager } from './services/state-machine-manager.service';
import { StateMachineRegistry } from './services/state-machine-registry.service';
import { TransitionExecutor } from './services/transition-executor.service';
import {
  ResolvedStateMachineOptions,
  StateMachineModuleAsyncOptions,
  StateMachineModuleOptions,
} from './interfaces/state-machine-module-options.interface';
import {
  DEFAULT_EMIT_EVENTS,
  DEFAULT_RECORD_CHANGES,
  STATE_DB_ADAPTER,
  STATE_MACHINE_MODULE_OPTIONS,
} from './state-machine.constants';

function resolveOptions(
  options: StateMachineModuleOptions,
): ResolvedStateMachineOptions {
  return {
    entities: options.entities ?? [],
    recordChanges: options.recordChanges ?? DEFAULT_RECORD_CHANGES,
    emitEvents: options.emitEvents ?? DEFAULT_EMIT_EVENTS,
  };
}

const SERVICES = [StateMachineRegistry, StateMachineManager, TransitionExecutor];

@Module({})
export class StateMachineModule {
  static forRoot(options: StateMachineModuleOptions): DynamicModule {
    return {
      module: StateMachineModule,
      imports: [DiscoveryModule, EventEmitterModule.forRoot()],
      providers: [
        {
          provide: STATE_DB_ADAPTER,
          useValue: options.adapter,
        },
        {
          provide: STATE_MACHINE_MODULE_OPTIONS,
          useValue: resolveOptions(options),
        },
        ...SERVICES,
      ],
      exports: [StateMachineManager, StateMachineRegistry, STATE_DB_ADAPTER],
      global: true,
    };
  }

  static forRootAsync(options: StateMachineModuleAsyncOptions): DynamicModule {
    const RAW_OPTIONS = Symbol('STATE_MACHINE_RAW_OPTIONS');

    return {
      module: StateMachineModule,
      imports: [
        DiscoveryModule,
        EventEmitterModule.forRoot(),
        ...(options.imports ?? []),
      ],
      providers: [
        {
          provide: RAW_OPTIONS,
          useFactory: (...args: unknown[]) => options.useFactory(...args),
          inject: options.inject ?? [],
        },
        {
          provide: STATE_MACHINE_MODULE_OPTIONS,
          useFactory: (raw: StateMachineModuleOptions) => resolveOptions(raw),
          inject: [RAW_OPTIONS],
        },
        {
          provide: STATE_DB_ADAPTER,
          useFactory: (raw: StateMachineModuleOptions) => raw.adapter,
          inject: [RAW_OPTIONS],
        },
        ...SERVICES,
      ],
      exports: [StateMachineManager, StateMachineRegistry, STATE_DB_ADAPTER],
      global: true,
    };
  }
}
