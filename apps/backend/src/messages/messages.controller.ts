import { Body, Controller, Get, HttpCode, Param, Post, Query } from '@nestjs/common';

import { SendMessageDto } from './dto/send-message.dto';
import { EngineService } from '../engine/engine.service';
import { runCommand } from '../engine/http-errors';

@Controller('messages')
export class MessagesController {
  constructor(private readonly engine: EngineService) {}

  @Get()
  list(@Query('nodeId') nodeId?: string) {
    return this.engine.listMessages(nodeId);
  }

  @Get('unread')
  unread() {
    return this.engine.listUnreadMessages();
  }

  @Post()
  async send(@Body() dto: SendMessageDto) {
    return runCommand(() => this.engine.requestSend(dto.destination, dto.text, dto.wantAck ?? false));
  }

  @Post(':id/read')
  @HttpCode(200)
  async markRead(@Param('id') id: string) {
    return runCommand(() => this.engine.markMessageRead(id));
  }
}
