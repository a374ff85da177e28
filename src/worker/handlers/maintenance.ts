import { Logger } from 'pino';
import { JobResult, MaintenanceJobName } from '../../shared/types';
import { SessionStore } from '../../domain/conversation/session-store';
import { ReviewService } from '../../domain/ticket/review';

export interface MaintenanceDeps {
  sessions: SessionStore;
  reviews: ReviewService;
  idleTimeoutMs: number;
  reviewSlaHours: number;
  purgeIdempotencyKeys?: () => Promise<number>;
  clock?: () => Date;
}

export type MaintenanceHandler = (name: MaintenanceJobName, logger: Logger) => Promise<JobResult>;

export function createMaintenanceHandler(deps: MaintenanceDeps): MaintenanceHandler {
  const clock = deps.clock ?? (() => new Date());

  return async function handleMaintenance(name, logger) {
    const now = clock();

    switch (name) {
      case 'sweep-idle-sessions': {
        const reset = await deps.sessions.resetIdle(new Date(now.getTime() - deps.idleTimeoutMs));
        const purged = deps.purgeIdempotencyKeys ? await deps.purgeIdempotencyKeys() : 0;
        logger.info({ reset, purged }, 'Idle sessions swept');
        return { status: 'completed', correlationId: name, action: `reset:${reset}` };
      }

      case 'review-reminders': {
        const cutoff = new Date(now.getTime() - deps.reviewSlaHours * 60 * 60 * 1000);
        const sent = await deps.reviews.sendReminders(cutoff);
        return { status: 'completed', correlationId: name, action: `reminded:${sent}` };
      }
    }
  };
}
