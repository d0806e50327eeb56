import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import { IStateDbAdapter } from './state-db-adapter.interface';
import type { StatefulType } from './stateful-record.interface';

export interface StateMachineModuleOptions {
  /** Database adapter instance implementing IStateDbAdapter */
  adapter: IStateDbAdapter;

  /** Stateful classes to register in addition to discovered providers */
  entities?: StatefulType[];

  /** Default for machines that do not set recordChanges. Default: true */
  recordChanges?: boolean;

  /** Emit transition events through EventEmitter2. Default: true */
  emitEvents?: boolean;
}

export interface StateMachineModuleAsyncOptions {
  imports?: ModuleMetadata['imports'];
  useFactory(
    ...args: unknown[]
  ): Promise<StateMachineModuleOptions> | StateMachineModuleOptions;
  inject?: FactoryProvider['inject'];
}

export interface ResolvedStateMachineOptions {
  entities: StatefulType[];
  recordChanges: boolean;
  emitEvents: boolean;
}
