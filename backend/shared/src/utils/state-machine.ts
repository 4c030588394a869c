import { InvalidStateTransitionError } from './errors';

/**
 * Allowed targets for every state. A state with no targets is terminal.
 */
export type TransitionTable<S extends string> = Readonly<Record<S, readonly S[]>>;

export interface StateMachine<S extends string> {
  readonly entity: string;
  canTransition(from: S, to: S): boolean;
  assertTransition(from: S, to: S): void;
  validTransitions(from: S): readonly S[];
  isTerminal(state: S): boolean;
}

/**
 * Build a state machine over a fixed transition table
 *
 * @example
 * const shipmentMachine = defineStateMachine('Shipment', {
 *   SHIPMENT_CREATED: ['PROCESSING', 'LOST'],
 *   ...
 * });
 * shipmentMachine.assertTransition(shipment.status, ShipmentStatus.PICKED_UP);
 */
export function defineStateMachine<S extends string>(
  entity: string,
  transitions: TransitionTable<S>
): StateMachine<S> {
  return {
    entity,

    canTransition(from: S, to: S): boolean {
      return transitions[from].includes(to);
    },

    assertTransition(from: S, to: S): void {
      if (!transitions[from].includes(to)) {
        throw new InvalidStateTransitionError(entity, from, to);
      }
    },

    validTransitions(from: S): readonly S[] {
      return transitions[from];
    },

    isTerminal(state: S): boolean {
      return transitions[state].length === 0;
    },
  };
}
