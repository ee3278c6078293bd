/**
 * Integration Tests — Blue/Green Deployment Endpoints
 */
import { createApp } from '@interfaces/http/app';
import request from 'supertest';

const app = createApp();

describe('GET /deployment/version', () => {
  it('should report the colour this replica was deployed as', async () => {
    const res = await request(app).get('/deployment/version');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      deployment_version: 'green',
      app_version: '9.9.9-test',
      environment: 'test',
    });
  });
});

describe('GET /deployment/blue', () => {
  it('should return the blue payload', async () => {
    const res = await request(app).get('/deployment/blue');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      deployment: 'blue',
      message: 'This is the BLUE deployment',
      version: '9.9.9-test',
      color: '#0066CC',
    });
  });
});

describe('GET /deployment/green', () => {
  it('should return the green payload', async () => {
    const res = await request(app).get('/deployment/green');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      deployment: 'green',
      message: 'This is the GREEN deployment',
      version: '9.9.9-test',
      color: '#00CC66',
    });
  });
});
