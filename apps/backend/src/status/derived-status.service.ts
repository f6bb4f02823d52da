import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { calculateStatus, statusEquals } from './status-calculator';
import { DerivedStatus } from './status.types';
import { resolveStatusThresholds, StatusThresholds } from '../config/engine-settings';
import { NodeState } from '../nodes/nodes.types';

/**
 * Binds the calculator to the configured thresholds and remembers the status last published
 * per node, so callers can tell which nodes actually changed.
 */
@Injectable()
export class DerivedStatusService {
  readonly thresholds: StatusThresholds;
  private readonly published = new Map<string, DerivedStatus>();

  constructor(configService: ConfigService) {
    this.thresholds = resolveStatusThresholds(configService);
  }

  calculate(node: NodeState, now = Date.now()): DerivedStatus {
    return calculateStatus(node, now, this.thresholds);
  }

  getPublished(nodeId: string): DerivedStatus | undefined {
    return this.published.get(nodeId);
  }

  /** Records `status` as published; returns false when it equals the previous one. */
  update(nodeId: string, status: DerivedStatus): boolean {
    const previous = this.published.get(nodeId);
    if (previous && statusEquals(previous, status)) {
      return false;
    }
    this.published.set(nodeId, status);
    return true;
  }

  forget(nodeId: string): void {
    this.published.delete(nodeId);
  }
}
