import {
  Injectable,
  Inject,
  OnModuleInit,
  OnModuleDestroy,
  Logger,
} from '@nestjs/common';
import { IncomingMessage } from 'http';
import WebSocket from 'ws';
import {
  AckFrame,
  ConnectionProvider,
  EnvelopeFrame,
  InboundFrame,
  SlackEvent,
} from '@app/shared/types/slack.types';
import { parseFrame } from '@app/shared/utils/frame-parser.utils';
import { CONNECTION_PROVIDER } from './slack.constants';
import { MessageHandler } from './handlers/message.handler';

export type ConnectionState =
  | 'disconnected'
  | 'connecting'
  | 'connected'
  | 'dispatching'
  | 'closed';

type ClosedListener = (error?: Error) => void;

const MAX_LOGGED_FRAME_CHARS = 500;

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * Owns the Socket Mode WebSocket. Frames are handled one at a time in arrival
 * order and every envelope is acknowledged exactly once, whether or not its
 * event could be processed. There is no reconnect: a lost connection closes
 * the service and the process is expected to be restarted by its supervisor.
 */
@Injectable()
export class SocketModeService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SocketModeService.name);
  private readonly closedListeners: ClosedListener[] = [];
  private socket: WebSocket | null = null;
  private state: ConnectionState = 'disconnected';
  private frameChain: Promise<void> = Promise.resolve();
  private closeError: Error | undefined;

  constructor(
    @Inject(CONNECTION_PROVIDER)
    private readonly connectionProvider: ConnectionProvider,
    private readonly messageHandler: MessageHandler,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.connect();
  }

  onModuleDestroy(): void {
    this.disconnect();
  }

  getState(): ConnectionState {
    return this.state;
  }

  /** Called once when the connection reaches `closed`; `error` is set when fatal. */
  onClosed(listener: ClosedListener): void {
    if (this.state === 'closed') {
      listener(this.closeError);
      return;
    }
    this.closedListeners.push(listener);
  }

  /** Resolves when every frame received so far has been handled. */
  whenIdle(): Promise<void> {
    return this.frameChain;
  }

  async connect(): Promise<void> {
    if (this.state !== 'disconnected') {
      throw new Error(`Cannot connect while ${this.state}`);
    }
    this.transition('connecting');

    let url: string;
    try {
      url = await this.connectionProvider.openConnection();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error(`Failed to obtain a Socket Mode endpoint: ${error.message}`);
      this.close(error);
      throw error;
    }

    await new Promise<void>((resolve, reject) => {
      const socket = new WebSocket(url);
      this.socket = socket;

      socket.once('upgrade', (response: IncomingMessage) => {
        this.logHandshake(response);
      });

      socket.once('open', () => {
        this.transition('connected');
        this.logger.log('Connected to Socket Mode');
        resolve();
      });

      socket.on('message', (data: WebSocket.RawData) => {
        this.enqueueFrame(rawDataToString(data));
      });

      socket.on('error', (err: Error) => {
        if (this.state === 'closed') {
          reject(err);
          return;
        }
        if (this.state === 'connecting') {
          this.logger.error(`Handshake failed: ${err.message}`);
          this.close(err);
          reject(err);
          return;
        }
        this.logger.error(`Transport error: ${err.message}`);
        this.close(err);
      });

      socket.on('close', (code: number, reason: Buffer) => {
        const detail = reason.length > 0 ? `: ${reason.toString()}` : '';
        const error = new Error(`Socket closed (code ${code}${detail})`);
        if (this.state === 'closed') {
          reject(error);
          return;
        }
        if (this.state === 'connecting') {
          this.close(error);
          reject(error);
          return;
        }
        this.logger.error(error.message);
        this.close(error);
      });
    });
  }

  /** Graceful shutdown; not reported as an error. */
  disconnect(): void {
    if (this.state === 'closed') return;
    this.logger.log('Disconnecting from Socket Mode');
    this.close();
  }

  async handleFrame(raw: string): Promise<void> {
    if (this.state === 'closed') return;

    const frame = parseFrame(raw);
    this.transition('dispatching');
    try {
      await this.dispatch(frame, raw);
    } finally {
      if (this.state === 'dispatching') {
        this.transition('connected');
      }
    }
  }

  private enqueueFrame(raw: string): void {
    this.frameChain = this.frameChain
      .then(() => this.handleFrame(raw))
      .catch((err) => {
        const error = err instanceof Error ? err : new Error(String(err));
        this.logger.error(`Fatal transport failure: ${error.message}`);
        this.close(error);
      });
  }

  private async dispatch(frame: InboundFrame, raw: string): Promise<void> {
    switch (frame.kind) {
      case 'hello': {
        const appId = frame.frame.connection_info?.app_id;
        this.logger.log(
          `Hello from Slack (app: ${typeof appId === 'string' ? appId : 'unknown'}, connections: ${frame.frame.num_connections ?? '?'})`,
        );
        return;
      }
      case 'disconnect': {
        const reason = frame.frame.reason ?? 'unknown';
        // `warning` precedes the real drop by a few seconds; the transport close ends the session
        if (reason === 'warning') {
          this.logger.warn('Slack warned that this connection will be dropped soon');
          return;
        }
        this.logger.warn(`Slack requested disconnect (reason: ${reason})`);
        this.close(new Error(`Disconnect requested by Slack (reason: ${reason})`));
        return;
      }
      case 'envelope':
        await this.dispatchEnvelope(frame.envelopeId, frame.frame, frame.event);
        return;
      case 'unparseable':
        this.logger.warn(
          `Unparseable frame (${frame.reason}): ${raw.slice(0, MAX_LOGGED_FRAME_CHARS)}`,
        );
        if (frame.envelopeId) {
          await this.ack(frame.envelopeId);
        } else {
          this.logger.warn('No envelope_id recovered; frame dropped');
        }
        return;
    }
  }

  private async dispatchEnvelope(
    envelopeId: string,
    envelope: EnvelopeFrame,
    event: SlackEvent,
  ): Promise<void> {
    switch (event.kind) {
      case 'mention':
      case 'channel_message':
        this.logger.log(
          `Received ${event.kind} [${envelopeId}] from ${event.event.user} in ${event.event.channel}`,
        );
        try {
          await this.messageHandler.handleMessage(event.event);
        } catch (err) {
          this.logger.error(
            `Message handling failed [${envelopeId}]: ${(err as Error).message}`,
          );
        }
        break;
      case 'reaction_updated':
        this.logger.log(
          `Received reaction update [${envelopeId}]: ${event.event.type} - ${event.event.reaction}`,
        );
        break;
      case 'thread_reply':
        this.logger.debug(`Ignoring thread reply [${envelopeId}]`);
        break;
      case 'message_deleted':
        this.logger.debug(`Ignoring message deletion [${envelopeId}]`);
        break;
      case 'unrecognized':
        this.logger.warn(
          `Unhandled ${envelope.type} envelope [${envelopeId}]${this.describeEvent(event.event)}`,
        );
        break;
    }

    await this.ack(envelopeId);
  }

  private ack(envelopeId: string): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(
        new Error(`Cannot acknowledge [${envelopeId}]: socket is not open`),
      );
    }

    const frame: AckFrame = { envelope_id: envelopeId };
    return new Promise<void>((resolve, reject) => {
      socket.send(JSON.stringify(frame), (err?: Error) => {
        if (err) {
          reject(err);
          return;
        }
        this.logger.log(`Acked message [${envelopeId}]`);
        resolve();
      });
    });
  }

  private close(error?: Error): void {
    if (this.state === 'closed') return;
    this.transition('closed');
    this.closeError = error;

    const socket = this.socket;
    if (socket && socket.readyState === WebSocket.OPEN && !error) {
      socket.close(1000);
    } else if (
      socket &&
      (socket.readyState === WebSocket.OPEN ||
        socket.readyState === WebSocket.CONNECTING)
    ) {
      socket.terminate();
    }

    const listeners = this.closedListeners.splice(0);
    for (const listener of listeners) {
      listener(error);
    }
  }

  private transition(next: ConnectionState): void {
    if (next !== 'dispatching' && !(this.state === 'dispatching' && next === 'connected')) {
      this.logger.debug(`State: ${this.state} -> ${next}`);
    }
    this.state = next;
  }

  private describeEvent(event: unknown): string {
    if (typeof event !== 'object' || event === null) return '';
    const type = 'type' in event ? event.type : undefined;
    const subtype = 'subtype' in event ? event.subtype : undefined;
    const parts = [type, subtype].filter((p): p is string => typeof p === 'string');
    return parts.length > 0 ? ` (event: ${parts.join('/')})` : '';
  }

  private logHandshake(response: IncomingMessage): void {
    this.logger.log(`Response HTTP code: ${response.statusCode}`);
    this.logger.log('Response contains the following headers:');
    for (const header of Object.keys(response.headers)) {
      this.logger.log(`* ${header}`);
    }
  }
}
