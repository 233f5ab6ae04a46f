import {
  canTransition,
  DocumentRecord,
  DocumentStatus,
} from './document-record.entity';
import { computeReadiness } from './session.entity';

const documents = (...statuses: DocumentStatus[]): DocumentRecord[] =>
  statuses.map((status, i) => ({
    id: `d${i}`,
    originalName: `d${i}.pdf`,
    savedName: `d${i}.pdf`,
    path: `/tmp/d${i}.pdf`,
    size: 1,
    status,
    updatedAt: new Date(0),
  }));

describe('computeReadiness', () => {
  it('está lista con al menos un documento listo', () => {
    expect(computeReadiness(documents('failed', 'processing', 'ready'))).toBe(
      'ready',
    );
  });

  it('falla solo si todos los documentos fallaron', () => {
    expect(computeReadiness(documents('failed', 'failed'))).toBe('failed');
    expect(computeReadiness(documents('failed', 'queued'))).toBe('pending');
  });

  it('una sesión sin documentos queda pendiente', () => {
    expect(computeReadiness([])).toBe('pending');
  });
});

describe('canTransition', () => {
  it.each<[DocumentStatus, DocumentStatus, boolean]>([
    ['queued', 'processing', true],
    ['processing', 'ready', true],
    ['processing', 'failed', true],
    ['queued', 'ready', false],
    ['queued', 'failed', false],
    ['ready', 'processing', false],
    ['failed', 'ready', false],
  ])('%s -> %s = %s', (from, to, expected) => {
    expect(canTransition(from, to)).toBe(expected);
  });
});
