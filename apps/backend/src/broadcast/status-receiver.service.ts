import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { ChangeSet, emptyChangeSet } from '../nodes/nodes.types';
import { NodesService } from '../nodes/nodes.service';
import { StatusBroadcastRecord } from '../packets/packet.types';

/**
 * Applies status broadcasts from other stations to their `remoteStatus`. Remote status is for
 * display only; it never feeds local health, and a remote help flag is never cleared here.
 */
@Injectable()
export class StatusReceiverService {
  private readonly logger = new Logger(StatusReceiverService.name);
  private readonly localNodeId: string | null;

  constructor(
    configService: ConfigService,
    private readonly nodesService: NodesService,
  ) {
    this.localNodeId = configService.get<string>('mesh.localNodeId') ?? null;
  }

  receive(record: StatusBroadcastRecord): ChangeSet {
    if (record.nodeId === this.localNodeId) {
      this.logger.warn('Ignoring status broadcast that claims to come from the local node');
      return emptyChangeSet('remote-status');
    }
    const { message } = record;
    this.logger.log(
      `Status from ${record.nodeId}: ${message.color} [${message.reasons.join(', ')}] help=${
        message.helpRequested ? 'YES' : 'NO'
      }`,
    );
    return this.nodesService.apply(record);
  }
}
