import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { WebClient, WebClientOptions } from '@slack/web-api';
import { slackConfig } from '@app/shared/config/configuration';
import {
  ChatPoster,
  ConnectionProvider,
  PostMessageParams,
} from '@app/shared/types/slack.types';

// Replies give up quickly instead of queueing behind rate-limit retries.
const BOT_CLIENT_OPTIONS: WebClientOptions = {
  timeout: 10000,
  rejectRateLimitedCalls: true,
  retryConfig: { retries: 2, maxRetryTime: 15000 },
};

/**
 * Web API calls the bridge needs: opening a Socket Mode connection with the
 * app-level token, and posting replies with the bot token.
 */
@Injectable()
export class SlackService implements ConnectionProvider, ChatPoster {
  private readonly logger = new Logger(SlackService.name);
  private readonly appClient: WebClient;
  private readonly botClient: WebClient;

  constructor(
    @Inject(slackConfig.KEY)
    private readonly slackCfg: ConfigType<typeof slackConfig>,
  ) {
    this.appClient = new WebClient(this.slackCfg.appToken);
    this.botClient = new WebClient(this.slackCfg.botToken, BOT_CLIENT_OPTIONS);
  }

  async openConnection(): Promise<string> {
    const result = await this.appClient.apps.connections.open({});
    if (!result.ok || !result.url) {
      throw new Error(
        `apps.connections.open failed: ${result.error ?? 'no url returned'}`,
      );
    }
    this.logger.log('Socket Mode endpoint acquired');
    return result.url;
  }

  async postMessage(params: PostMessageParams): Promise<{ ts?: string }> {
    const result = await this.botClient.chat.postMessage({
      channel: params.channel,
      text: params.text,
      thread_ts: params.thread_ts,
    });
    return { ts: result.ts };
  }
}
