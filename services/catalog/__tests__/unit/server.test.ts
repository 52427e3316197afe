/**
 * Router tests: the catalog app on an ephemeral port
 */

import { AddressInfo } from 'net';
import { Server } from 'http';
import { NamedEntityStore, NamedEntityTable } from '@geav/shared';
import { createServer } from '../../src/server';
import { RecordingAuditLogger } from '../../../../shared/__tests__/fixtures/RecordingAuditLogger';

const createdAt = new Date('2024-02-20T09:00:00.000Z');

function mockStore(): jest.Mocked<NamedEntityStore> {
  return {
    getById: jest.fn(),
    list: jest.fn(),
    create: jest.fn(),
    update: jest.fn(),
    delete: jest.fn(),
  };
}

describe('catalog server', () => {
  let stores: Record<NamedEntityTable, jest.Mocked<NamedEntityStore>>;
  let audit: RecordingAuditLogger;
  let server: Server;
  let baseUrl: string;

  beforeEach((done) => {
    stores = { ramos: mockStore(), tags_lugares: mockStore(), tags_cancoes: mockStore() };
    audit = new RecordingAuditLogger();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);

    const app = createServer({ serviceName: 'geav-site-api', stores, audit });
    server = app.listen(0, () => {
      const { port } = server.address() as AddressInfo;
      baseUrl = `http://127.0.0.1:${port}`;
      done();
    });
  });

  afterEach((done) => {
    jest.restoreAllMocks();
    server.close(() => done());
  });

  it('should route /ramos to the ramos table', async () => {
    stores.ramos.list.mockResolvedValue([{ id: 2, name: 'lobinho', createdAt }]);

    const response = await fetch(`${baseUrl}/ramos`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual([{ id: 2, name: 'lobinho', created_at: '2024-02-20T09:00:00.000Z' }]);
    expect(stores.tags_lugares.list).not.toHaveBeenCalled();
  });

  it('should route POST /tags/cancoes to the song tags table', async () => {
    stores.tags_cancoes.create.mockResolvedValue({ id: 5, name: 'acampamento', createdAt });

    const response = await fetch(`${baseUrl}/tags/cancoes`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ name: 'acampamento' }),
    });

    expect(response.status).toBe(201);
    expect(stores.tags_cancoes.create).toHaveBeenCalledWith('acampamento');
    expect(audit.last?.audit?.resource).toBe('tags_cancoes');
  });

  it('should route DELETE /tags/lugares/:id to the place tags table', async () => {
    stores.tags_lugares.delete.mockResolvedValue();

    const response = await fetch(`${baseUrl}/tags/lugares/9`, { method: 'DELETE' });

    expect(response.status).toBe(204);
    expect(stores.tags_lugares.delete).toHaveBeenCalledWith(9);
  });

  it('should answer 404 for /tags without a catalog', async () => {
    const response = await fetch(`${baseUrl}/tags`);

    expect(response.status).toBe(404);
  });
});
