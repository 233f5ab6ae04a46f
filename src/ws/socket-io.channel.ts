import { Socket } from 'socket.io';
import {
  RealtimeChannel,
  ServerEvents,
} from './interfaces/realtime.interface';

export class SocketIoChannel implements RealtimeChannel {
  constructor(private readonly socket: Socket) {}

  get id(): string {
    return this.socket.id;
  }

  get identity(): string {
    return this.socket.handshake.address;
  }

  /**
   * Acepta `auth.sessionId` (recomendado) o `?sessionId=` en la URL.
   */
  get sessionId(): string | undefined {
    const fromAuth: unknown = this.socket.handshake.auth?.sessionId;
    if (typeof fromAuth === 'string' && fromAuth) return fromAuth;

    const fromQuery = this.socket.handshake.query.sessionId;
    return typeof fromQuery === 'string' && fromQuery ? fromQuery : undefined;
  }

  send<E extends Exclude<keyof ServerEvents, 'session-closed'>>(
    event: E,
    payload: ServerEvents[E],
  ): void {
    this.socket.emit(event, payload);
  }

  close(code: ServerEvents['session-closed']['code'], reason: string): void {
    this.socket.emit('session-closed', { code, reason });
    this.socket.disconnect(true);
  }
}
