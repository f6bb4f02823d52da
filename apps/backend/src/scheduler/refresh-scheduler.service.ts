import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Observable, Subject } from 'rxjs';

import { ChangeSet, NodeState } from '../nodes/nodes.types';
import { NodesService } from '../nodes/nodes.service';
import { DerivedStatusService } from '../status/derived-status.service';
import { DerivedStatus } from '../status/status.types';

export interface RefreshTick {
  now: number;
  nodes: ReadonlyMap<string, NodeState>;
  statuses: ReadonlyMap<string, DerivedStatus>;
  /** Nodes whose derived status differs from the last published one. */
  changes: ChangeSet;
}

/**
 * Time-driven re-evaluation. Offline and staleness transitions happen with no packet to trigger
 * them, so every tick re-derives all statuses against a fresh clock reading.
 */
@Injectable()
export class RefreshSchedulerService implements OnModuleDestroy {
  private readonly logger = new Logger(RefreshSchedulerService.name);
  private readonly ticks$ = new Subject<RefreshTick>();
  private readonly intervalMs: number;
  private timer?: NodeJS.Timeout;

  constructor(
    configService: ConfigService,
    private readonly nodesService: NodesService,
    private readonly derivedStatus: DerivedStatusService,
  ) {
    this.intervalMs = configService.get<number>('refresh.intervalSeconds', 5) * 1000;
  }

  getTickStream(): Observable<RefreshTick> {
    return this.ticks$.asObservable();
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.logger.log(`Refreshing node status every ${this.intervalMs / 1000}s`);
  }

  /** No tick starts after this returns; ticks run synchronously, so none is left in flight. */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
      this.logger.log('Refresh scheduler stopped');
    }
  }

  onModuleDestroy(): void {
    this.stop();
    this.ticks$.complete();
  }

  tick(now = Date.now()): RefreshTick {
    const nodes = this.nodesService.snapshot();
    const statuses = new Map<string, DerivedStatus>();
    const changed: string[] = [];

    nodes.forEach((node, nodeId) => {
      const status = this.derivedStatus.calculate(node, now);
      statuses.set(nodeId, status);
      if (this.derivedStatus.update(nodeId, status)) {
        changed.push(nodeId);
      }
    });

    const tick: RefreshTick = {
      now,
      nodes,
      statuses,
      changes: { nodeIds: changed, removed: [], reason: 'refresh' },
    };
    if (changed.length > 0) {
      this.logger.debug(`Refresh changed ${changed.length} nodes`);
    }
    this.ticks$.next(tick);
    return tick;
  }
}
