import { existsSync } from 'node:fs';
import { join } from 'node:path';
import request from 'supertest';
import { createTestApp, shutdownTestApp, TEST_API_KEY } from './helpers/test-app';
import type { BootstrappedApp } from './helpers/test-app';
import { LifecycleService } from '../src/lifecycle/lifecycle.service';
import { NOTHING_DUE_MARKER } from '../src/certificate/client/certbot-client.service';
import type { CommandResult } from '../src/shared/command-runner.service';

const ok = (output = ''): CommandResult => ({ exitCode: 0, output });

const healthyHost = (command: string, args: readonly string[]): CommandResult => {
  if (command === 'certbot' && args[0] === 'renew') {
    return ok(`Processing /etc/letsencrypt/renewal/x.example.com.conf\n${NOTHING_DUE_MARKER}\n`);
  }
  if (command === 'certbot') {
    return ok('Successfully received certificate.\n');
  }
  return ok();
};

describe('Certificate lifecycle (e2e)', () => {
  let instance: BootstrappedApp;
  let lifecycle: LifecycleService;

  // Resolves once every event queued so far has been handled
  const settle = () => lifecycle.dispatch('update-status');

  beforeAll(async () => {
    instance = await createTestApp(healthyHost);
    lifecycle = instance.app.get(LifecycleService);
  });

  afterAll(async () => {
    await shutdownTestApp(instance);
  });

  it('should report ready after installation', async () => {
    const response = await request(instance.httpServer)
      .get('/api/status')
      .set('X-API-Key', TEST_API_KEY)
      .expect(200);

    expect(response.body.status).toMatchObject({ state: 'active', message: 'ready' });
    expect(response.body.flags).toMatchObject({ installed: true, registered: false });
    expect(instance.commands.calls).toEqual([]);
  });

  it('should reject requests without an API key', async () => {
    const response = await request(instance.httpServer).get('/api/status').expect(401);

    expect(response.body.message).toBe('Missing X-API-Key header');
  });

  it('should reject a malformed certificate request', async () => {
    await request(instance.httpServer)
      .post('/api/certificates/requests')
      .set('X-API-Key', TEST_API_KEY)
      .send({ fqdns: ['not_a_domain'] })
      .expect(400);

    await request(instance.httpServer)
      .post('/api/certificates/requests')
      .set('X-API-Key', TEST_API_KEY)
      .send({ fqdns: ['x.example.com'], force: true })
      .expect(400);
  });

  it('should issue a requested certificate with the web service yielded', async () => {
    const response = await request(instance.httpServer)
      .post('/api/certificates/requests')
      .set('X-API-Key', TEST_API_KEY)
      .send({ fqdns: ['x.example.com'], contactEmail: '' })
      .expect(202);

    expect(response.body).toMatchObject({ fqdns: ['x.example.com'], source: 'api' });

    await settle();

    expect(instance.commands.calls).toEqual([
      'systemctl is-active --quiet nginx',
      'systemctl stop nginx',
      `certbot certonly --standalone --agree-tos --non-interactive -d x.example.com --register-unsafely-without-email --config-dir ${instance.configDir}`,
      'systemctl start nginx',
    ]);
    expect(existsSync(join(instance.configDir, 'dhparam.pem'))).toBe(true);

    const status = await request(instance.httpServer)
      .get('/api/status')
      .set('X-API-Key', TEST_API_KEY)
      .expect(200);

    expect(status.body.status).toMatchObject({ state: 'active', message: 'registered x.example.com' });
    expect(status.body.flags).toMatchObject({ registered: true, renewalArmed: true, certificateRequested: false });
    expect(status.body.pendingRequests).toBe(0);
    expect(status.body.renewalSchedule).toMatch(/^([1-9]|[1-5][0-9]) 6,18 \* \* \*$/);
  });

  it('should report healthy once registered', async () => {
    const response = await request(instance.httpServer).get('/health').expect(200);

    expect(response.body.info.lifecycle).toEqual({
      status: 'up',
      state: 'active',
      message: 'registered x.example.com',
    });
    expect(response.body.info.certificate).toMatchObject({ status: 'up', count: 0, expiring: [] });
  });

  it('should leave the web service alone when no renewal is due', async () => {
    const before = instance.commands.calls.length;

    const response = await request(instance.httpServer)
      .post('/api/certificates/renew')
      .set('X-API-Key', TEST_API_KEY)
      .expect(202);

    expect(response.body).toEqual({ message: 'Renewal requested' });

    await settle();

    expect(instance.commands.calls.slice(before)).toEqual([
      `certbot renew --agree-tos --config-dir ${instance.configDir}`,
    ]);

    const status = await request(instance.httpServer)
      .get('/api/status')
      .set('X-API-Key', TEST_API_KEY)
      .expect(200);

    expect(status.body.status).toMatchObject({ state: 'active', message: 'registered x.example.com' });
    expect(status.body.flags.renewRequested).toBe(false);
    expect(status.body.lastRenewedAt).toBeNull();
  });

  it('should block and restart the web service when issuance fails', async () => {
    instance.commands.respondWith((command, args) =>
      command === 'certbot' && args[0] === 'certonly'
        ? { exitCode: 1, output: 'Some challenges have failed.' }
        : healthyHost(command, args),
    );
    const before = instance.commands.calls.length;

    await request(instance.httpServer)
      .post('/api/certificates/requests')
      .set('X-API-Key', TEST_API_KEY)
      .send({ fqdns: ['y.example.com'] })
      .expect(202);

    await settle();

    expect(instance.commands.calls.slice(before)).toEqual([
      'systemctl is-active --quiet nginx',
      'systemctl stop nginx',
      `certbot certonly --standalone --agree-tos --non-interactive -d y.example.com --register-unsafely-without-email --config-dir ${instance.configDir}`,
      'systemctl start nginx',
    ]);

    const status = await request(instance.httpServer)
      .get('/api/status')
      .set('X-API-Key', TEST_API_KEY)
      .expect(200);

    expect(status.body.status).toMatchObject({
      state: 'blocked',
      message: 'letsencrypt registration failed: \nSome challenges have failed.',
    });
    expect(status.body.pendingRequests).toBe(0);

    await request(instance.httpServer).get('/health').expect(503);
  });
  it('should keep the registration when a due renewal fails', async () => {
    instance.commands.respondWith((command, args) =>
      command === 'certbot' && args[0] === 'renew'
        ? { exitCode: 1, output: 'Failed to renew certificate x.example.com' }
        : healthyHost(command, args),
    );
    const before = instance.commands.calls.length;

    await request(instance.httpServer)
      .post('/api/certificates/renew')
      .set('X-API-Key', TEST_API_KEY)
      .expect(202);

    await settle();

    expect(instance.commands.calls.slice(before)).toEqual([
      `certbot renew --agree-tos --config-dir ${instance.configDir}`,
      'systemctl is-active --quiet nginx',
      'systemctl stop nginx',
      `certbot renew --agree-tos --config-dir ${instance.configDir}`,
      'systemctl start nginx',
    ]);

    const status = await request(instance.httpServer)
      .get('/api/status')
      .set('X-API-Key', TEST_API_KEY)
      .expect(200);

    expect(status.body.status).toMatchObject({
      state: 'blocked',
      message: 'letsencrypt renewal failed: \nFailed to renew certificate x.example.com',
    });
    expect(status.body.flags).toMatchObject({ registered: true, renewRequested: false });
    expect(status.body.lastRenewedAt).toBeNull();
  });

  it('should attempt a failed fqdn once until the settings change again', async () => {
    instance.commands.respondWith((command, args) =>
      command === 'certbot' && args[0] === 'certonly'
        ? { exitCode: 1, output: 'Some challenges have failed.' }
        : healthyHost(command, args),
    );
    const certonlyCalls = () => instance.commands.calls.filter((call) => call.includes('-d b.example.com'));

    const response = await request(instance.httpServer)
      .put('/api/settings')
      .set('X-API-Key', TEST_API_KEY)
      .send({ fqdn: 'b.example.com' })
      .expect(200);

    expect(response.body.flags).toMatchObject({ registered: false, fqdnChanged: false, fqdnFailed: true });
    expect(certonlyCalls()).toHaveLength(1);

    await settle();
    await settle();

    expect(certonlyCalls()).toHaveLength(1);

    await request(instance.httpServer)
      .put('/api/settings')
      .set('X-API-Key', TEST_API_KEY)
      .send({ contactEmail: 'admin@example.com' })
      .expect(200);

    expect(certonlyCalls()).toEqual([
      `certbot certonly --standalone --agree-tos --non-interactive -d b.example.com --register-unsafely-without-email --config-dir ${instance.configDir}`,
      `certbot certonly --standalone --agree-tos --non-interactive -d b.example.com --email admin@example.com --config-dir ${instance.configDir}`,
    ]);
  });
});
