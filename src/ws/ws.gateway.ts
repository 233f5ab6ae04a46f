import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  SubscribeMessage,
  WebSocketGateway,
} from '@nestjs/websockets';
import { Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { Socket } from 'socket.io';
import { envs } from 'src/config/envs';
import { describeError } from 'src/common/errors';
import { ConnectionParamsDto } from './dto/connection-params.dto';
import { CloseCode } from './interfaces/realtime.interface';
import { SocketIoChannel } from './socket-io.channel';
import { WsService } from './ws.service';

@WebSocketGateway({
  cors: {
    origin: envs.corsOrigin,
    credentials: true,
  },
})
export class WsGateway implements OnGatewayConnection, OnGatewayDisconnect {
  private logger = new Logger(WsGateway.name);

  constructor(private readonly wsService: WsService) {}

  async handleConnection(client: Socket) {
    const channel = new SocketIoChannel(client);
    try {
      if (!(await this.hasValidParams(channel))) {
        this.logger.warn(
          `Handshake inválido: socket=${client.id} session=${channel.sessionId ?? '-'}`,
        );
        channel.close(CloseCode.SESSION_UNKNOWN, 'Session unknown');
        return;
      }
      await this.wsService.open(channel);
    } catch (error) {
      this.logger.error(
        `Error al conectar WS`,
        error instanceof Error ? error.stack : String(error),
      );
      client.disconnect(true);
    }
  }

  async handleDisconnect(client: Socket) {
    try {
      await this.wsService.close(client.id);
    } catch (error) {
      this.logger.error(
        `Error al liberar la sesión del socket ${client.id}: ${describeError(error)}`,
      );
    }
  }

  private async hasValidParams(channel: SocketIoChannel): Promise<boolean> {
    const params = plainToInstance(ConnectionParamsDto, {
      sessionId: channel.sessionId,
    });
    const errors = await validate(params);
    return errors.length === 0;
  }

  @SubscribeMessage('question')
  async onQuestion(
    @ConnectedSocket() client: Socket,
    @MessageBody() payload: unknown,
  ) {
    try {
      await this.wsService.handleQuestion(client.id, payload);
    } catch (error) {
      this.logger.error(
        `Error al procesar la pregunta - WS: ${describeError(error)}`,
      );
    }
  }

  @SubscribeMessage('end-session')
  async onEndSession(@ConnectedSocket() client: Socket) {
    await this.wsService.endSession(client.id);
  }
}
