import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { securityConfig } from '@app/shared/config/configuration';
import { CommandParseError, QueueFullError } from '@app/shared/errors/command.errors';
import { ParsedCommandRequest } from '@app/shared/types/executor.types';
import {
  ChatPoster,
  CommandMessageEvent,
  PostMessageParams,
} from '@app/shared/types/slack.types';
import {
  extractRequest,
  unescapeSlackText,
} from '@app/shared/utils/command-parser.utils';
import { ExecutorService } from '../../executor/executor.service';
import { CHAT_POSTER } from '../slack.constants';
import {
  buildParseErrorMessage,
  buildQueueFullMessage,
  buildUsageMessage,
} from '../formatters/execution-message.formatter';

/**
 * Turns a mention or channel message into a queued execution job.
 * Returns once the job is queued; replies and results are posted off the ack path.
 */
@Injectable()
export class MessageHandler {
  private readonly logger = new Logger(MessageHandler.name);

  constructor(
    private readonly executorService: ExecutorService,
    @Inject(CHAT_POSTER)
    private readonly chatPoster: ChatPoster,
    @Inject(securityConfig.KEY)
    private readonly secCfg: ConfigType<typeof securityConfig>,
  ) {}

  isAllowedUser(userId: string): boolean {
    if (this.secCfg.allowedUserIds.length === 0) return true;
    return this.secCfg.allowedUserIds.includes(userId);
  }

  isAllowedChannel(channelId: string): boolean {
    if (this.secCfg.allowedChannelIds.length === 0) return true;
    return this.secCfg.allowedChannelIds.includes(channelId);
  }

  async handleMessage(event: CommandMessageEvent): Promise<void> {
    if (event.bot_id) {
      return;
    }

    if (!this.isAllowedUser(event.user)) {
      this.logger.warn(`Ignoring message from unauthorized user ${event.user}`);
      return;
    }

    if (!this.isAllowedChannel(event.channel)) {
      this.logger.warn(`Ignoring message in unauthorized channel ${event.channel}`);
      return;
    }

    const threadTs = event.thread_ts ?? event.ts;

    let request: ParsedCommandRequest;
    try {
      request = extractRequest(unescapeSlackText(event.text));
    } catch (err) {
      if (!(err instanceof CommandParseError)) throw err;

      if (err.code === 'NO_CODE_BLOCK') {
        this.logger.debug(`No command block in message ${event.ts}`);
        // plain channel chatter stays silent; a mention was meant for the bot
        if (event.type === 'app_mention') {
          this.reply({ ...buildUsageMessage(event.channel), thread_ts: threadTs });
        }
        return;
      }

      this.logger.warn(`Command parse error (${err.code}): ${err.message}`);
      this.reply({ ...buildParseErrorMessage(err, event.channel), thread_ts: threadTs });
      return;
    }

    try {
      const job = this.executorService.submitJob(request, event.user, {
        channel: event.channel,
        thread_ts: threadTs,
      });
      this.logger.log(`New job from ${event.user}: ${job.id.slice(0, 8)}`);
    } catch (err) {
      if (!(err instanceof QueueFullError)) throw err;

      this.logger.warn(err.message);
      this.reply({ ...buildQueueFullMessage(err, event.channel), thread_ts: threadTs });
    }
  }

  /** Not awaited: the envelope is acked without waiting on the Web API. */
  private reply(params: PostMessageParams): void {
    this.chatPoster.postMessage(params).catch((err) => {
      this.logger.error(`Failed to post reply: ${(err as Error).message}`);
    });
  }
}
