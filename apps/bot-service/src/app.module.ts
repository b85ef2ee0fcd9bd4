import { Module } from '@nestjs/common';
import { SharedModule } from '@app/shared';
import { SlackModule } from './slack/slack.module';
import { ExecutorModule } from './executor/executor.module';
import { SocketModeModule } from './slack/socket-mode.module';

@Module({
  imports: [SharedModule, SlackModule, ExecutorModule, SocketModeModule],
})
export class AppModule {}
