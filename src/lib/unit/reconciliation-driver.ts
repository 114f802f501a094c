import { EventEmitterProtected } from '../event-emitter';
import { generateEventID } from '../id-helpers';
import type { LoggerService } from '../logger/logger-service';
import type {
  ActionEventName,
  ActionResult,
  DispatchResult,
  ReconciliationDriverOptions,
  TransitionResult,
  UnitEventName,
  UnitStatus,
} from './types';
import type { BaseUnit } from './base-unit';
import type { StatusPublisher } from './status-publisher';
import type { ReconciliationDriverEventMap } from './events';
import { ReconciliationDriverEvents } from './events';
import { UnknownEventError } from './errors';
import { formatStatus } from './status';

export const UNIT_EVENT_NAMES: readonly UnitEventName[] = [
  'install',
  'update_status',
  'pre_series_upgrade',
  'post_series_upgrade',
  'pause_action',
  'resume_action',
];

export function isUnitEventName(value: unknown): value is UnitEventName {
  return UNIT_EVENT_NAMES.some((name) => name === value);
}

function isActionEvent(event: UnitEventName): event is ActionEventName {
  return event === 'pause_action' || event === 'resume_action';
}

/**
 * Operator-facing summary of a pause/resume action
 */
export function toActionResult(
  event: ActionEventName,
  transition: TransitionResult,
): ActionResult {
  const verb = event === 'pause_action' ? 'pause' : 'resume';
  const pastTense = event === 'pause_action' ? 'paused' : 'resumed';

  if (transition.failedServices.length > 0) {
    return {
      success: false,
      message: `Failed to ${verb} services: ${transition.failedServices.join(', ')}`,
      failedServices: [...transition.failedServices],
    };
  }

  return {
    success: true,
    message:
      transition.succeededServices.length > 0
        ? `Services ${pastTense}: ${transition.succeededServices.join(', ')}`
        : `No services to ${verb}`,
    failedServices: [],
  };
}

/**
 * Turns inbound lifecycle events into transitions and a published status.
 *
 * Events are processed strictly one at a time: a dispatch made while another
 * is running waits for it, also when the earlier one fails. Each successful
 * dispatch publishes exactly one status.
 *
 * @example
 * ```typescript
 * const driver = new ReconciliationDriver(unit, publisher, { logger });
 *
 * await driver.dispatch('install');
 * const { action } = await driver.dispatch('pause_action');
 * console.log(action?.message); // "Services paused: apache2, ks-api"
 * ```
 */
export class ReconciliationDriver extends EventEmitterProtected<ReconciliationDriverEventMap> {
  private readonly unit: BaseUnit;
  private readonly publisher: StatusPublisher;
  private readonly logger: LoggerService;
  private readonly driverEvents: ReconciliationDriverEvents;

  private queue: Promise<void> = Promise.resolve();
  private pending = 0;
  private lastStatus: UnitStatus | null = null;

  constructor(
    unit: BaseUnit,
    publisher: StatusPublisher,
    options: ReconciliationDriverOptions,
  ) {
    const logger = options.logger.service(
      options.name ?? 'reconciliation-driver',
    );

    super((event, error) => {
      logger.errorObject(`Listener for ${event} failed`, error);
    });

    this.unit = unit;
    this.publisher = publisher;
    this.logger = logger;
    this.driverEvents = new ReconciliationDriverEvents((event, data) => {
      this.emit(event, data);
    });
  }

  /**
   * Status published by the last successful dispatch
   */
  public get currentStatus(): UnitStatus | null {
    return this.lastStatus ? { ...this.lastStatus } : null;
  }

  /**
   * Dispatches queued or running
   */
  public get pendingCount(): number {
    return this.pending;
  }

  /**
   * Handle one event: run its transition, then evaluate and publish the status.
   *
   * Rejects (without publishing) when the transition, a status check or the
   * publisher fails; later dispatches still run.
   *
   * @throws {UnknownEventError} If `event` is not a unit event
   */
  public dispatch(event: UnitEventName): Promise<DispatchResult> {
    if (!isUnitEventName(event)) {
      return Promise.reject(new UnknownEventError({ event: String(event) }));
    }

    this.pending++;

    const run = this.queue
      .then(() => this.process(event))
      .finally(() => {
        this.pending--;
      });

    // The caller observes the rejection through `run`; the queue only orders
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );

    return run;
  }

  /**
   * Wait until every queued dispatch has settled
   */
  public async idle(): Promise<void> {
    await this.queue;
  }

  private async process(event: UnitEventName): Promise<DispatchResult> {
    const eventID = generateEventID();
    const params = { event, eventID };

    this.driverEvents.eventDispatched(eventID, event);
    this.logger.info('Handling {{event}} ({{eventID}})', { params });

    try {
      if (!this.unit.state.isLoaded) {
        await this.unit.begin();
      }

      const transition = await this.runTransition(event);
      if (transition) {
        this.driverEvents.transitionCompleted(eventID, event, transition);
      }

      const action =
        transition && isActionEvent(event)
          ? toActionResult(event, transition)
          : null;

      const verdict = await this.unit.evaluateStatus();
      await this.publisher.publish(verdict.status);
      this.lastStatus = verdict.status;

      this.logger.info('Status {{status}} (decided by {{decidedBy}})', {
        params: { status: formatStatus(verdict.status), decidedBy: verdict.decidedBy },
      });
      this.driverEvents.statusPublished({
        eventID,
        event,
        status: verdict.status,
        decidedBy: verdict.decidedBy,
      });

      if (action) {
        if (action.success) {
          this.logger.success(action.message);
        } else {
          this.logger.warn(action.message);
        }
        this.driverEvents.actionCompleted(eventID, event, action);
      }

      return { eventID, event, transition, status: verdict.status, action };
    } catch (error) {
      this.logger.errorObject(`Event ${event} (${eventID}) failed`, error);
      this.driverEvents.eventFailed(eventID, event, error);
      throw error;
    }
  }

  private runTransition(event: UnitEventName): Promise<TransitionResult | null> {
    const { lifecycle } = this.unit;

    switch (event) {
      case 'install':
        return lifecycle.install();
      case 'pre_series_upgrade':
        return lifecycle.beginUpgrade();
      case 'post_series_upgrade':
        return lifecycle.endUpgrade();
      case 'pause_action':
        return lifecycle.pause();
      case 'resume_action':
        return lifecycle.resume();
      case 'update_status':
        return Promise.resolve(null);
    }
  }
}
