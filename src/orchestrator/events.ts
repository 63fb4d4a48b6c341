import { EventEmitter } from 'events';
import type { Trigger } from './transitions';
import type { State } from './states';

export interface StateChangeEvent {
  from: State;
  to: State;
  trigger: Trigger;
  runId: string;
  /** WorkflowState version after the transition */
  version: number;
  timestamp: string;
}

export class StateMachineEvents extends EventEmitter {
  emitTransition(event: StateChangeEvent): void {
    this.emit('stateChange', event);
  }

  onTransition(listener: (event: StateChangeEvent) => void): () => void {
    this.on('stateChange', listener);
    return () => this.off('stateChange', listener);
  }
}
