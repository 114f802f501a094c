import type {
  ActionResult,
  TransitionResult,
  UnitEventName,
  UnitStatus,
} from './types';

export interface ReconciliationDriverEventMap {
  'event:dispatched': { eventID: string; event: UnitEventName };
  'transition:completed': {
    eventID: string;
    event: UnitEventName;
    result: TransitionResult;
  };
  'status:published': {
    eventID: string;
    event: UnitEventName;
    status: UnitStatus;
    decidedBy: string;
  };
  'action:completed': {
    eventID: string;
    event: UnitEventName;
    result: ActionResult;
  };
  'event:failed': { eventID: string; event: UnitEventName; error: unknown };
}

export type ReconciliationDriverEventName = keyof ReconciliationDriverEventMap;

export type ReconciliationDriverEmit = <
  K extends ReconciliationDriverEventName,
>(
  event: K,
  data: ReconciliationDriverEventMap[K],
) => void;

/**
 * Typed helpers so call sites don't build payloads by hand
 */
export class ReconciliationDriverEvents {
  constructor(private readonly emit: ReconciliationDriverEmit) {}

  public eventDispatched(eventID: string, event: UnitEventName): void {
    this.emit('event:dispatched', { eventID, event });
  }

  public transitionCompleted(
    eventID: string,
    event: UnitEventName,
    result: TransitionResult,
  ): void {
    this.emit('transition:completed', { eventID, event, result });
  }

  public statusPublished(input: {
    eventID: string;
    event: UnitEventName;
    status: UnitStatus;
    decidedBy: string;
  }): void {
    this.emit('status:published', input);
  }

  public actionCompleted(
    eventID: string,
    event: UnitEventName,
    result: ActionResult,
  ): void {
    this.emit('action:completed', { eventID, event, result });
  }

  public eventFailed(eventID: string, event: UnitEventName, error: unknown): void {
    this.emit('event:failed', { eventID, event, error });
  }
}
