import { BehaviorSubject } from 'rxjs';
import { DocumentRecord, isTerminal } from './document-record.entity';

export type ConnectionState = 'unconnected' | 'connected' | 'closed';

/**
 * - `pending`: ningún documento listo y al menos uno sigue en proceso.
 * - `ready`: al menos un documento está listo.
 * - `failed`: todos los documentos terminaron con error.
 */
export type ReadinessState = 'pending' | 'ready' | 'failed';

export interface Session {
  id: string;
  createdAt: Date;
  lastActivity: Date;
  documents: DocumentRecord[];
  connection: ConnectionState;
  connectionId: string | null;
  readiness$: BehaviorSubject<ReadinessState>;
}

export const computeReadiness = (
  documents: readonly DocumentRecord[],
): ReadinessState => {
  if (documents.some((d) => d.status === 'ready')) return 'ready';
  if (documents.length && documents.every((d) => isTerminal(d.status))) {
    return 'failed';
  }
  return 'pending';
};
