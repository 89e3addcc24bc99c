import { toKebab } from '../naming.js';
import type { Entity, Operation, Service } from '../ontology/types.js';
import { compareKeys, dedupe } from '../util.js';
import { constraintMatches, type EntityLayout } from './constraints.js';
import {
  classifyTransitionVariant,
  confirmMessage,
  transitionLabel,
} from './editorial.js';
import type { StateMachineSchema, TransitionDescriptor } from './types.js';

interface EndpointBinding {
  basePath: string;
  entityPath: string;
  /** Transition operations by target state. */
  byTarget: Map<string, Operation>;
}

/**
 * Where the entity's transitions live. Without any operation naming a path
 * the entity falls back to `/<kebab-entity>s` under an empty base path.
 */
function bindEndpoints(
  entity: Entity,
  services: readonly Service[]
): EndpointBinding {
  const binding: EndpointBinding = {
    basePath: '',
    entityPath: `${toKebab(entity.id)}s`,
    byTarget: new Map(),
  };

  for (const service of services) {
    for (const operation of service.operations) {
      if (operation.entity !== entity.name) {
        continue;
      }
      if (operation.entityPath) {
        binding.basePath = operation.basePath;
        binding.entityPath = operation.entityPath;
      }
      if (operation.kind === 'transition' && operation.toStatus) {
        binding.byTarget.set(operation.toStatus, operation);
      }
    }
  }

  return binding;
}

function describeTransition(
  entity: Entity,
  from: string,
  target: string,
  binding: EndpointBinding,
  layout: EntityLayout
): TransitionDescriptor {
  const variant = classifyTransitionVariant(target);
  const confirm = variant === 'danger';
  const operation = binding.byTarget.get(target);

  const basePath = operation?.entityPath
    ? operation.basePath
    : binding.basePath;
  const entityPath = operation?.entityPath || binding.entityPath;
  const action = operation?.action ?? toKebab(target);

  const requiresFields = dedupe([
    ...(operation?.extraFields ?? []),
    ...layout.constraints
      .filter(
        (constraint) =>
          constraint.field === 'status' && constraintMatches(constraint, target)
      )
      .flatMap((constraint) => constraint.requires),
  ]);

  return {
    target,
    label: transitionLabel(from, target),
    variant,
    confirm,
    confirm_message: confirm ? confirmMessage(target, entity.name) : undefined,
    api_endpoint: `POST ${basePath}/${entityPath}/{id}/${action}`,
    requires_fields: requiresFields.length > 0 ? requiresFields : undefined,
  };
}

/**
 * Transition descriptors for every declared state, sorted by state. A
 * terminal state maps to an empty list.
 */
export function buildStateMachine(
  entity: Entity,
  services: readonly Service[],
  layout: EntityLayout
): StateMachineSchema | undefined {
  const machine = entity.stateMachine;
  if (!machine) {
    return undefined;
  }

  const binding = bindEndpoints(entity, services);
  const transitions: Record<string, TransitionDescriptor[]> = {};
  for (const state of [...machine.keys()].sort(compareKeys)) {
    const targets = machine.get(state) ?? [];
    transitions[state] = targets.map((target) =>
      describeTransition(entity, state, target, binding, layout)
    );
  }

  return { transitions };
}
