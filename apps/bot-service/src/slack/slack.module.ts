import { Module } from '@nestjs/common';
import { SlackService } from './slack.service';
import { CHAT_POSTER, CONNECTION_PROVIDER } from './slack.constants';

@Module({
  providers: [
    SlackService,
    { provide: CONNECTION_PROVIDER, useExisting: SlackService },
    { provide: CHAT_POSTER, useExisting: SlackService },
  ],
  exports: [SlackService, CONNECTION_PROVIDER, CHAT_POSTER],
})
export class SlackModule {}
