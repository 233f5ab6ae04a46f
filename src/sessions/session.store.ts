import { Injectable } from '@nestjs/common';
import { KeyedLock } from 'src/common/utils/keyed-lock';
import { Session } from './domain/entities/session.entity';

/**
 * Registro de sesiones vivas. Toda mutación de una sesión pasa por
 * `withSession`, que serializa por id sin bloquear a las demás sesiones.
 */
@Injectable()
export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly lock = new KeyedLock();

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  values(): Session[] {
    return [...this.sessions.values()];
  }

  size(): number {
    return this.sessions.size;
  }

  add(session: Session): void {
    if (this.sessions.has(session.id)) {
      throw new Error(`Session ${session.id} already exists`);
    }
    this.sessions.set(session.id, session);
  }

  /**
   * Ejecuta `fn` con exclusión sobre la sesión. Si la sesión no existe
   * (o se elimina mientras espera su turno) `fn` recibe `undefined`.
   */
  withSession<T>(
    sessionId: string,
    fn: (session: Session | undefined) => T | Promise<T>,
  ): Promise<T> {
    return this.lock.run(sessionId, () => fn(this.sessions.get(sessionId)));
  }

  delete(sessionId: string): Promise<Session | undefined> {
    return this.lock.run(sessionId, () => {
      const session = this.sessions.get(sessionId);
      this.sessions.delete(sessionId);
      return session;
    });
  }
}
