import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { executorConfig } from '@app/shared/config/configuration';
import { SlackModule } from '../slack/slack.module';
import { CommandRegistry } from './command-registry';
import { loadRegistry } from './registry.loader';
import { QueueService } from './queue.service';
import { ExecutorService } from './executor.service';

@Module({
  imports: [SlackModule],
  providers: [
    {
      provide: CommandRegistry,
      inject: [executorConfig.KEY],
      useFactory: (cfg: ConfigType<typeof executorConfig>) =>
        loadRegistry(cfg.executorsFile),
    },
    QueueService,
    ExecutorService,
  ],
  exports: [CommandRegistry, QueueService, ExecutorService],
})
export class ExecutorModule {}
