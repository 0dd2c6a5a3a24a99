import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import request from 'supertest';
import { TEST_API_KEY, TEST_DOMAIN, useTestAppLifecycle } from './helpers/test-app';

interface BindingBody {
  serviceName: string;
  certificateId: number;
  inSync: boolean;
}

interface StatusBody {
  domain: string;
  selected?: { certificateId: number; certificateType: string };
  bindings: BindingBody[];
}

describe('Certificate lifecycle (e2e)', () => {
  const testApp = useTestAppLifecycle();
  let certificateId: number;

  const api = () => request(testApp.httpServer);

  async function waitForBinding(id: number, timeoutMs = 5000): Promise<StatusBody> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const response = await api().get(`/api/certificates/status/${TEST_DOMAIN}`).set('X-API-Key', TEST_API_KEY).expect(200);
      const status: StatusBody = response.body;
      if (status.bindings.some((binding) => binding.certificateId === id && binding.inSync)) {
        return status;
      }
      if (Date.now() > deadline) {
        throw new Error(`Binding for certificate ${id} never became current`);
      }
      await new Promise((resolve) => setTimeout(resolve, 50));
    }
  }

  it('reports unhealthy while the domain has no certificate', async () => {
    const response = await api().get('/health').expect(503);

    expect(response.body.status).toBe('error');
    expect(response.body.error.certificate).toMatchObject({ status: 'down', uncovered: [TEST_DOMAIN] });
  });

  it('rejects operator calls without an API key', async () => {
    await api().get('/api/certificates').expect(401);
  });

  it('rejects operator calls with the wrong API key', async () => {
    await api().get('/api/certificates').set('X-API-Key', 'wrong-key').expect(401);
  });

  it('generates a self-signed certificate on request', async () => {
    const response = await api()
      .post('/api/certificates/generate')
      .set('X-API-Key', TEST_API_KEY)
      .send({ domain: TEST_DOMAIN, type: 'self-signed' })
      .expect(200);

    expect(response.body.outcome).toBe('issued');
    expect(response.body.certificate).toMatchObject({
      domain: TEST_DOMAIN,
      certificateType: 'self-signed',
      isActive: true,
      autoRenew: true,
    });
    certificateId = response.body.certificate.id;
  });

  it('reuses the current certificate unless forced', async () => {
    const response = await api()
      .post('/api/certificates/generate')
      .set('X-API-Key', TEST_API_KEY)
      .send({ domain: TEST_DOMAIN, type: 'self-signed' })
      .expect(200);

    expect(response.body.outcome).toBe('existing');
    expect(response.body.certificate.id).toBe(certificateId);
  });

  it('propagates the new certificate to the managed service', async () => {
    const status = await waitForBinding(certificateId);

    expect(status.selected).toMatchObject({ certificateId, certificateType: 'self-signed' });
    expect(status.bindings).toEqual([expect.objectContaining({ serviceName: 'mail', certificateId, inSync: true })]);

    const rendered = readFileSync(join(testApp.workDir, 'rendered', 'mail-ssl.conf'), 'utf-8');
    expect(rendered).toContain(`id=${certificateId}\n`);
    expect(rendered).toContain(`cert=${join(testApp.workDir, 'certificates', 'self-signed', TEST_DOMAIN, 'fullchain.pem')}\n`);
  });

  it('reports healthy once the domain is covered', async () => {
    const response = await api().get('/health').expect(200);

    expect(response.body.status).toBe('ok');
    expect(response.body.info.certificate).toMatchObject({ status: 'up', uncovered: [], alarms: [] });
  });

  it('lists certificates for the domain', async () => {
    const response = await api().get('/api/certificates').query({ domain: TEST_DOMAIN }).set('X-API-Key', TEST_API_KEY).expect(200);

    expect(response.body).toHaveLength(1);
    expect(response.body[0].id).toBe(certificateId);
  });

  it('rejects unknown properties in a generate request', async () => {
    await api()
      .post('/api/certificates/generate')
      .set('X-API-Key', TEST_API_KEY)
      .send({ domain: TEST_DOMAIN, type: 'self-signed', priority: 'high' })
      .expect(400);
  });

  it('rejects manual as a generated type', async () => {
    await api()
      .post('/api/certificates/generate')
      .set('X-API-Key', TEST_API_KEY)
      .send({ domain: TEST_DOMAIN, type: 'manual' })
      .expect(400);
  });

  it('rejects an invalid domain', async () => {
    await api().get('/api/certificates/status/not_a_domain').set('X-API-Key', TEST_API_KEY).expect(400);
  });

  it('verifies stored files against their checksums', async () => {
    const response = await api().post('/api/certificates/verify').set('X-API-Key', TEST_API_KEY).send({ certificateId }).expect(200);

    expect(response.body.drifted).toEqual([]);
    expect(response.body.checked).toBeGreaterThan(0);
    expect(response.body.verified).toBe(response.body.checked);
  });

  it('answers 404 when deactivating an unknown certificate', async () => {
    await api().post('/api/certificates/9999/deactivate').set('X-API-Key', TEST_API_KEY).send({}).expect(404);
  });

  it('deactivates a certificate so it is no longer selected', async () => {
    const response = await api()
      .post(`/api/certificates/${certificateId}/deactivate`)
      .set('X-API-Key', TEST_API_KEY)
      .send({ reason: 'rotated by operator' })
      .expect(200);

    expect(response.body.isActive).toBe(false);

    const status = await api().get(`/api/certificates/status/${TEST_DOMAIN}`).set('X-API-Key', TEST_API_KEY).expect(200);
    expect(status.body.selected).toBeUndefined();
    expect(status.body.selectionMiss).toBeDefined();
  });
});
