import { EventEmitter } from 'events';
import type { Trigger } from './transitions';
import type { Phase, ResultTag } from './states';

export type PhaseTrigger = Trigger | 'ITERATION_LIMIT' | 'UNKNOWN_PHASE';

export interface PhaseChangeEvent {
  /** Previous phase; may be an unrecognised name read from disk */
  from: string;
  to: Phase;
  trigger: PhaseTrigger;
  taskId: string;
  iteration: number;
  result: ResultTag | null;
  timestamp: string;
}

export class StateMachineEvents extends EventEmitter {
  emitTransition(event: PhaseChangeEvent): void {
    this.emit('phaseChange', event);
  }

  onTransition(listener: (event: PhaseChangeEvent) => void): this {
    return this.on('phaseChange', listener);
  }
}
