import { Injectable, Logger, OnModuleDestroy, UsePipes, ValidationPipe } from '@nestjs/common';
import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayInit,
  SubscribeMessage,
  WebSocketGateway,
  WebSocketServer,
  WsException,
} from '@nestjs/websockets';
import { Subscription } from 'rxjs';
import { Server, Socket } from 'socket.io';

import { EngineService } from '../engine/engine.service';
import { SendMessageDto } from '../messages/dto/send-message.dto';
import { MessagesService } from '../messages/messages.service';

/**
 * Pushes engine state to dashboards: a full `init` on connect, then `changes`, `alerts` and
 * `messages` as they happen. Removed nodes arrive as ids in `changes.removed`.
 */
@WebSocketGateway({
  namespace: '/ws',
  cors: { origin: true, credentials: true },
})
@Injectable()
export class TelemetryGateway implements OnGatewayInit, OnGatewayConnection, OnModuleDestroy {
  private readonly logger = new Logger(TelemetryGateway.name);
  @WebSocketServer()
  server!: Server;

  private readonly subscriptions: Subscription[] = [];

  constructor(
    private readonly engine: EngineService,
    private readonly messagesService: MessagesService,
  ) {}

  afterInit(server: Server): void {
    this.subscriptions.push(
      this.engine.changes$.subscribe((change) => {
        server.emit('changes', { ...change, nodes: this.engine.describeNodes(change.nodeIds) });
      }),
      this.engine.alerts$.subscribe((alert) => {
        server.emit('alerts', alert);
      }),
      this.messagesService.getUpdatesStream().subscribe((message) => {
        server.emit('messages', message);
      }),
    );
  }

  handleConnection(@ConnectedSocket() client: Socket): void {
    client.emit('init', {
      status: this.engine.getStatus(),
      nodes: this.engine.listNodes(),
      alerts: this.engine.getActiveAlerts(),
      messages: this.engine.listMessages(),
    });
    this.logger.debug(`Dashboard client ${client.id} connected`);
  }

  onModuleDestroy(): void {
    this.subscriptions.splice(0).forEach((subscription) => subscription.unsubscribe());
  }

  @SubscribeMessage('sendMessage')
  @UsePipes(new ValidationPipe({ transform: true }))
  async handleSendMessage(@MessageBody() dto: SendMessageDto) {
    try {
      const message = await this.engine.requestSend(dto.destination, dto.text, dto.wantAck ?? false);
      return { event: 'message.sent', data: message };
    } catch (error) {
      throw new WsException(error instanceof Error ? error.message : 'Unknown error');
    }
  }
}
