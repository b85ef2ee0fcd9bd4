import { Module } from '@nestjs/common';
import { SlackModule } from './slack.module';
import { ExecutorModule } from '../executor/executor.module';
import { SocketModeService } from './socket-mode.service';
import { MessageHandler } from './handlers/message.handler';

@Module({
  imports: [SlackModule, ExecutorModule],
  providers: [SocketModeService, MessageHandler],
  exports: [SocketModeService],
})
export class SocketModeModule {}
