/**
 * Integration Tests — Log/Trace Generators and Error Injection
 */
import { createApp } from '@interfaces/http/app';
import request from 'supertest';

const app = createApp();

describe('GET /observability/logs', () => {
  it('should report the levels it wrote', async () => {
    const res = await request(app).get('/observability/logs');

    expect(res.status).toBe(200);
    expect(res.body.message).toBe('Test logs generated');
    expect(res.body.levels).toEqual(['info', 'warning', 'error']);
  });
});

describe('GET /observability/trace', () => {
  it('should return a fabricated trace id and three spans', async () => {
    const before = Date.now();
    const res = await request(app).get('/observability/trace');

    expect(res.status).toBe(200);
    expect(res.body.message).toBe('Trace endpoint completed');
    expect(res.body.trace_id).toMatch(/^trace-\d+$/);
    expect(Number(res.body.trace_id.slice('trace-'.length))).toBeGreaterThanOrEqual(before);
    expect(res.body.span_count).toBe(3);
  });
});

describe('error injection', () => {
  it('should answer /error/500 with a 500', async () => {
    const res = await request(app).get('/error/500');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ status: 'error', message: 'Internal Server Error - Test endpoint' });
  });

  it('should answer /error/404 with a 404', async () => {
    const res = await request(app).get('/error/404');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ status: 'error', message: 'Not Found - Test endpoint' });
  });
});
