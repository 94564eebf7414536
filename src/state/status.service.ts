import { Injectable, Logger } from '@nestjs/common';
import { StateStoreService } from './state-store.service';
import type { WorkloadState, WorkloadStatus } from './interfaces';

/**
 * Three-valued status channel reported to operators.
 *
 * - blocked: needs human attention
 * - waiting: will be retried automatically on the next cycle
 * - active: healthy
 */
@Injectable()
export class StatusService {
  private readonly logger = new Logger(StatusService.name);

  constructor(private readonly stateStore: StateStoreService) {}

  current(): WorkloadStatus | null {
    return this.stateStore.snapshot().status;
  }

  set(state: WorkloadState, message: string): WorkloadStatus {
    const status: WorkloadStatus = { state, message, updatedAt: new Date().toISOString() };

    this.stateStore.update((draft) => {
      draft.status = status;
    });

    switch (state) {
      case 'blocked':
        this.logger.error(`Status blocked: ${message}`);
        break;
      case 'waiting':
        this.logger.warn(`Status waiting: ${message}`);
        break;
      case 'active':
        this.logger.log(`Status active: ${message}`);
        break;
    }

    return status;
  }

  active(message: string): WorkloadStatus {
    return this.set('active', message);
  }

  waiting(message: string): WorkloadStatus {
    return this.set('waiting', message);
  }

  blocked(message: string): WorkloadStatus {
    return this.set('blocked', message);
  }
}
