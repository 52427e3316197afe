/**
 * Unit tests for PostgresCancaoRepository
 */

import { NotFoundError } from '@geav/shared';
import { PostgresCancaoRepository } from '../../src/repositories/CancaoRepository';
import { CancaoRow, NewCancao } from '../../src/models/Cancao';

const createdAt = new Date('2024-06-01T08:30:00.000Z');

const cancaoRow: CancaoRow = {
  id: 12,
  nome: 'Cancao da Partida',
  link_youtube: null,
  letra: null,
  user_id: 5,
  created_at: createdAt,
  updated_at: createdAt,
};

const newCancao: NewCancao = {
  nome: 'Cancao da Partida',
  linkYoutube: 'https://youtube.example/watch?v=abc',
  letra: 'La la la',
  userId: 5,
  createdAt,
  updatedAt: createdAt,
};

describe('PostgresCancaoRepository', () => {
  let db: { query: jest.Mock };
  let repository: PostgresCancaoRepository;

  beforeEach(() => {
    db = { query: jest.fn() };
    repository = new PostgresCancaoRepository(db);
  });

  it('should decode null text columns and load tags then ramos', async () => {
    db.query
      .mockResolvedValueOnce({ rows: [cancaoRow], rowCount: 1 })
      .mockResolvedValueOnce({ rows: [{ id: 1, name: 'fogo de conselho', created_at: createdAt }], rowCount: 1 })
      .mockResolvedValueOnce({ rows: [], rowCount: 0 });

    const cancao = await repository.getById(12);

    expect(cancao).toEqual({
      id: 12,
      nome: 'Cancao da Partida',
      linkYoutube: '',
      letra: '',
      userId: 5,
      createdAt,
      updatedAt: createdAt,
      tags: [{ id: 1, name: 'fogo de conselho', createdAt }],
      ramos: [],
    });
    expect(db.query.mock.calls[1][0]).toContain('JOIN cancoes_tags ct ON t.id = ct.tag_id');
    expect(db.query.mock.calls[2][0]).toContain('JOIN cancoes_ramos cr ON r.id = cr.ramo_id');
    expect(db.query.mock.calls[2][1]).toEqual([12]);
  });

  it('should return null for a missing cancao', async () => {
    db.query.mockResolvedValue({ rows: [], rowCount: 0 });

    await expect(repository.getById(12)).resolves.toBeNull();
  });

  it('should list ordered by id', async () => {
    db.query.mockResolvedValueOnce({ rows: [], rowCount: 0 });

    await expect(repository.list()).resolves.toEqual([]);
    expect(db.query.mock.calls[0][0]).toContain('FROM cancoes ORDER BY id');
  });

  it('should insert and return the id', async () => {
    db.query.mockResolvedValue({ rows: [{ id: 12 }], rowCount: 1 });

    await expect(repository.create(newCancao)).resolves.toBe(12);
    expect(db.query.mock.calls[0][1]).toEqual([
      'Cancao da Partida',
      'https://youtube.example/watch?v=abc',
      'La la la',
      5,
      createdAt,
      createdAt,
    ]);
  });

  it('should pass the id last on update', async () => {
    db.query.mockResolvedValue({ rows: [], rowCount: 1 });

    await repository.update(12, newCancao);

    expect(db.query.mock.calls[0][1]).toEqual([
      'Cancao da Partida',
      'https://youtube.example/watch?v=abc',
      'La la la',
      5,
      createdAt,
      12,
    ]);
  });

  it('should throw NotFoundError when update or delete touch no row', async () => {
    db.query.mockResolvedValue({ rows: [], rowCount: 0 });

    await expect(repository.update(12, newCancao)).rejects.toThrow(NotFoundError);
    await expect(repository.delete(12)).rejects.toThrow('cancao with ID 12 not found');
  });

  it('should ignore duplicate links', async () => {
    db.query.mockResolvedValue({ rows: [], rowCount: 0 });

    await repository.addRamo(12, 2);

    expect(db.query.mock.calls[0][0]).toContain('ON CONFLICT (cancao_id, ramo_id) DO NOTHING');
    expect(db.query.mock.calls[0][1]).toEqual([12, 2]);
  });

  it('should wrap a failed unlink', async () => {
    db.query.mockRejectedValue(new Error('timeout'));

    await expect(repository.removeTag(12, 1)).rejects.toMatchObject({
      code: 'DATABASE_ERROR',
      message: 'Error removing tag from cancao: timeout',
    });
  });
});
