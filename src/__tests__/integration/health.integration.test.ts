/**
 * Integration Tests — Health & Info Endpoints
 *
 *   GET /  GET /ping  GET /health  GET /version
 *
 * jest.setup.ts pins APP_VERSION, APP_ENVIRONMENT and DEPLOYMENT_VERSION, so
 * the reported metadata is asserted exactly.
 */
import { createApp } from '@interfaces/http/app';
import request from 'supertest';

const app = createApp();

function isIsoTimestamp(value: unknown): boolean {
  return typeof value === 'string' && new Date(value).toISOString() === value;
}

describe('GET /', () => {
  it('should describe the service', async () => {
    const res = await request(app).get('/');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      message: 'Kubernetes Test Application',
      version: '9.9.9-test',
      environment: 'test',
      deployment_version: 'green',
    });
    expect(isIsoTimestamp(res.body.timestamp)).toBe(true);
  });

  it('should allow cross-origin callers', async () => {
    const res = await request(app).get('/').set('Origin', 'http://dashboard.test');

    expect(res.headers['access-control-allow-origin']).toBe('*');
  });
});

describe('GET /ping', () => {
  it('should answer pong', async () => {
    const res = await request(app).get('/ping');

    expect(res.status).toBe(200);
    expect(res.body.message).toBe('pong');
    expect(isIsoTimestamp(res.body.timestamp)).toBe(true);
  });
});

describe('GET /health', () => {
  it('should report healthy with host facts', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toMatch(/application\/json/);
    expect(res.body).toMatchObject({
      status: 'healthy',
      version: '9.9.9-test',
      environment: 'test',
      deployment_version: 'green',
    });
    expect(Object.keys(res.body.system_info).sort()).toEqual([
      'cpu_count',
      'disk_usage',
      'hostname',
      'memory_available',
      'memory_total',
      'node_version',
      'platform',
    ]);
    expect(res.body.system_info.node_version).toBe(process.versions.node);
    expect(typeof res.body.system_info.cpu_count).toBe('number');
  });
});

describe('GET /version', () => {
  it('should report version and deployment colour', async () => {
    const res = await request(app).get('/version');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      version: '9.9.9-test',
      environment: 'test',
      deployment_version: 'green',
    });
    expect(isIsoTimestamp(res.body.build_timestamp)).toBe(true);
  });
});

describe('unknown routes', () => {
  it('should answer 404 in the error envelope', async () => {
    const res = await request(app).get('/nope');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ status: 'error', message: 'Route not found: GET /nope' });
  });
});
