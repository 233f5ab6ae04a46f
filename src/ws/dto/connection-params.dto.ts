import { IsUUID } from 'class-validator';

/** Parámetros que el cliente envía en el handshake. */
export class ConnectionParamsDto {
  @IsUUID()
  sessionId!: string;
}
