export type DocumentStatus = 'queued' | 'processing' | 'ready' | 'failed';

export interface DocumentRecord {
  id: string;
  originalName: string;
  savedName: string;
  path: string;
  size: number;
  status: DocumentStatus;
  failureReason?: string;
  updatedAt: Date;
}

// queued -> processing -> { ready, failed }; nunca hacia atrás ni saltando processing
const ALLOWED_TRANSITIONS: Record<DocumentStatus, readonly DocumentStatus[]> = {
  queued: ['processing'],
  processing: ['ready', 'failed'],
  ready: [],
  failed: [],
};

export const canTransition = (
  from: DocumentStatus,
  to: DocumentStatus,
): boolean => ALLOWED_TRANSITIONS[from].includes(to);

export const isTerminal = (status: DocumentStatus): boolean =>
  status === 'ready' || status === 'failed';
