/**
 * Basic integration tests for the agent runtime Express app.
 *
 * Verifies the healthcheck endpoint is wired and the app can be built
 * without a runtime.
 */
import request from 'supertest';
import { createApp } from '../src/app';

describe('agent runtime app', () => {
  const app = createApp();

  it('should respond to GET /health with status 200 and JSON body', async () => {
    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toMatch(/application\/json/);
    expect(response.body).toHaveProperty('status', 'ok');
    expect(response.body).toHaveProperty('service', 'agent-runtime');
    expect(typeof response.body.timestamp).toBe('string');
  });

  it('does not expose runtime routes when no runtime is wired', async () => {
    const response = await request(app).get('/v1/capabilities');

    expect(response.status).toBe(404);
  });
});
