import type { StateMachine } from '../ontology/types.js';
import { compareKeys } from '../util.js';
import { classifyStateColor } from './editorial.js';
import type { StatusColor, StatusSchema } from './types.js';

/**
 * Every state the machine names, declared or only reached, sorted.
 */
export function machineStates(machine: StateMachine): string[] {
  const states = new Set<string>();
  for (const [state, targets] of machine) {
    states.add(state);
    for (const target of targets) {
      states.add(target);
    }
  }
  return [...states].sort(compareKeys);
}

/**
 * States with no outgoing transitions. A state that is only ever a target
 * has none either.
 */
export function terminalStates(machine: StateMachine): Set<string> {
  const terminal = new Set<string>();
  for (const state of machineStates(machine)) {
    const targets = machine.get(state);
    if (!targets || targets.length === 0) {
      terminal.add(state);
    }
  }
  return terminal;
}

export function buildStatus(machine: StateMachine): StatusSchema {
  const terminal = terminalStates(machine);
  const targets = new Set([...machine.values()].flat());

  const colorMapping: Record<string, StatusColor> = {};
  for (const state of machineStates(machine)) {
    colorMapping[state] = classifyStateColor(state, terminal, targets);
  }

  return { field: 'status', color_mapping: colorMapping };
}
