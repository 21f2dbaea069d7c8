import { type Action } from './authorization';

export type ContentState = 'visible' | 'removed' | 'purged';
export type LifecycleTransition = 'remove' | 'restore' | 'purge';

const TRANSITIONS: Record<ContentState, Partial<Record<LifecycleTransition, ContentState>>> = {
  visible: { remove: 'removed', purge: 'purged' },
  removed: { restore: 'visible', purge: 'purged' },
  purged: {},
};

export class LifecycleError extends Error {
  constructor(
    public readonly kind: 'NOT_FOUND' | 'CONFLICT',
    message: string,
  ) {
    super(message);
    this.name = 'LifecycleError';
  }
}

export function stateOf(entity: { visible: boolean } | null): ContentState {
  if (!entity) return 'purged';
  return entity.visible ? 'visible' : 'removed';
}

/**
 * Applies `transition` to `state`. Purged records no longer exist, so every
 * transition out of `purged` is NOT_FOUND; other illegal moves are CONFLICT.
 */
export function nextState(state: ContentState, transition: LifecycleTransition): ContentState {
  if (state === 'purged') {
    throw new LifecycleError('NOT_FOUND', 'Record does not exist');
  }
  const target = TRANSITIONS[state][transition];
  if (!target) {
    throw new LifecycleError('CONFLICT', `Cannot ${transition} a ${state} record`);
  }
  return target;
}

/** Restoring needs exactly what removing needs; purging needs the foreign delete permission. */
export function transitionAction(
  resource: 'article' | 'comment',
  transition: LifecycleTransition,
): Action {
  if (transition === 'purge') {
    return resource === 'article' ? 'article:purge' : 'comment:purge';
  }
  return resource === 'article' ? 'article:delete' : 'comment:delete';
}
