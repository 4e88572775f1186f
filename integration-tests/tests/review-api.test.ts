/**
 * Review API Tests
 *
 * The HTTP surface over a project whose state was written by a batch run.
 */

import type { Server } from 'http';
import { InMemorySpreadsheet, runBatch } from '@ledgerline/shared';
import { createApp } from '../../services/review-api/src/app';
import {
  discovered,
  FakeTextExtractor,
  fixedClock,
  makeProjectDir,
  removeDir,
  StaticDocumentSource,
  standardInvoiceText,
} from './helpers';

const INVOICE_PATH = '/obra/01 - Alfa/NOTA FISCAL/NF 1234.pdf';
const INSS_KEY = encodeURIComponent('1|2023-08|inss');

async function seedBatch(projectDir: string): Promise<void> {
  await runBatch(
    { projectDir, mode: 'incremental', ocrEnabled: false },
    {
      source: new StaticDocumentSource([discovered(INVOICE_PATH)]),
      text: new FakeTextExtractor().setText(
        INVOICE_PATH,
        standardInvoiceText({ number: '1234', competence: '08/2023', total: '10.000,00', iss: '500,00', inss: '1.100,00' })
      ),
      spreadsheet: new InMemorySpreadsheet([
        { provider: 1, competence: '2023-08', field: 'invoice-total', value: 1000000 },
        { provider: 1, competence: '2023-08', field: 'inss', value: 100000 },
        { provider: 1, competence: '2023-08', field: 'iss', value: 50000 },
      ]),
    }
  );
}

describe('Review API', () => {
  let projectDir: string;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    projectDir = await makeProjectDir();
    const app = createApp({ projectDir, now: fixedClock() });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    await removeDir(projectDir);
  });

  function post(path: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  it('should report health with the project name', async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'healthy', service: 'review-api', project: 'Residencial Aurora' });
  });

  it('should answer 404 before the first batch', async () => {
    const res = await fetch(`${baseUrl}/status`, { headers: { 'X-Correlation-Id': 'test-correlation' } });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: {
        code: 'not_found',
        message: 'No batch has run for this project yet',
        correlation_id: 'test-correlation',
      },
    });
  });

  it('should return the verdict of the last run', async () => {
    await seedBatch(projectDir);

    const res = await fetch(`${baseUrl}/status`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      verdict: {
        status: 'action-needed',
        steps: [{ stage: 'resolve-divergences', providers: [1], competences: ['2023-08'], count: 1 }],
      },
    });
  });

  it('should filter divergences by classification', async () => {
    await seedBatch(projectDir);

    const res = await fetch(`${baseUrl}/divergences?classification=value-mismatch`);
    const body: unknown = await res.json();

    expect(body).toMatchObject({
      items: [{ key: '1|2023-08|inss', spreadsheet_value: 100000, extracted_value: 110000, resolution: null }],
    });
  });

  it('should reject a non-numeric provider filter', async () => {
    await seedBatch(projectDir);

    const res = await fetch(`${baseUrl}/divergences?provider=abc`);

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: 'invalid_request', message: 'provider must be an integer' } });
  });

  it('should resolve a divergence and keep the resolution on later reads', async () => {
    await seedBatch(projectDir);

    const res = await post(`/divergences/${INSS_KEY}/resolution`, { policy: 'keep-spreadsheet' });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      resolution: { key: '1|2023-08|inss', policy: 'keep-spreadsheet', resolved_value: 100000 },
      divergence: { classification: 'value-mismatch', resolution: { policy: 'keep-spreadsheet' } },
    });

    const status = await fetch(`${baseUrl}/status`);
    expect(await status.json()).toMatchObject({ verdict: { status: 'up-to-date' } });
  });

  it('should reject a malformed divergence key', async () => {
    const res = await post('/divergences/abc/resolution', { policy: 'keep-spreadsheet' });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: { code: 'invalid_request', message: 'Malformed divergence key: abc' },
    });
  });

  it('should reject an unknown policy', async () => {
    await seedBatch(projectDir);

    const res = await post(`/divergences/${INSS_KEY}/resolution`, { policy: 'overwrite' });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: 'invalid_request' } });
  });

  it('should resolve matching divergences in bulk', async () => {
    await seedBatch(projectDir);

    const res = await post('/divergences/resolve-all', { policy: 'accept-extracted', provider: 1 });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ resolved: 1, items: [{ key: '1|2023-08|inss', resolved_value: 110000 }] });
  });

  it('should list documents and refuse to review settled ones', async () => {
    await seedBatch(projectDir);

    const list = await fetch(`${baseUrl}/documents?status=extracted`);
    expect(await list.json()).toMatchObject({ items: [{ path: INVOICE_PATH, status: 'extracted' }] });

    const review = await post('/documents/review', { path: INVOICE_PATH });
    expect(review.status).toBe(400);
    expect(await review.json()).toMatchObject({
      error: { code: 'invalid_request', message: `Document ${INVOICE_PATH} is extracted, not awaiting review` },
    });
  });

  it('should answer unknown routes with the error envelope', async () => {
    const res = await fetch(`${baseUrl}/nothing-here`);

    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ error: { code: 'not_found', message: 'No route for GET /nothing-here' } });
  });
});
