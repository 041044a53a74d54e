import {
  GameEvent,
  GameEventPayload,
} from '../../common/interfaces/game-event.interface';

export function nextEventId(events: readonly GameEvent[]): number {
  return events.length === 0 ? 0 : events[events.length - 1].id + 1;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Append an event with the next id. The only writer of the log is
 * advancement, which holds the events lock while calling this. Logged events
 * are frozen, payload included, so readers can share them.
 */
export function appendEvent(
  events: GameEvent[],
  payload: GameEventPayload,
): GameEvent {
  const event: GameEvent = deepFreeze({ id: nextEventId(events), ...payload });
  events.push(event);
  return event;
}

export function eventsSince(
  events: readonly GameEvent[],
  sinceId: number,
): GameEvent[] {
  return events.filter((event) => event.id >= sinceId);
}
