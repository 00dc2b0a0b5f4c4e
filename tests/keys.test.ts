import express from 'express';
import request from 'supertest';
import { keyByHeader, keyByIp, keyByPrincipal, type KeyGenerator } from '../src/lib/keys';

function keyOf(generator: KeyGenerator, withPrincipal = false) {
  const app = express();
  app.set('trust proxy', true);
  app.use((req, _res, next) => {
    if (withPrincipal) req.principal = { subject: 'user-1', issuedAt: new Date(0), expiresAt: new Date(0), scopes: [] };
    next();
  });
  app.get('/', (req, res) => res.send(generator(req)));
  return app;
}

describe('key generators', () => {
  test('keyByIp uses the forwarded client address', async () => {
    const res = await request(keyOf(keyByIp())).get('/').set('X-Forwarded-For', '203.0.113.7');
    expect(res.text).toBe('ip:203.0.113.7');
  });

  test('keyByPrincipal prefers the subject', async () => {
    const authenticated = await request(keyOf(keyByPrincipal(), true)).get('/').set('X-Forwarded-For', '203.0.113.7');
    const anonymous = await request(keyOf(keyByPrincipal())).get('/').set('X-Forwarded-For', '203.0.113.7');

    expect(authenticated.text).toBe('sub:user-1');
    expect(anonymous.text).toBe('ip:203.0.113.7');
  });

  test('keyByHeader reads the header and falls back when asked', async () => {
    const withHeader = await request(keyOf(keyByHeader('X-Api-Key'))).get('/').set('x-api-key', 'client-a');
    const anonymous = await request(keyOf(keyByHeader())).get('/');
    const fallback = await request(keyOf(keyByHeader('x-api-key', { fallbackToIp: true }))).get('/').set('X-Forwarded-For', '203.0.113.7');

    expect(withHeader.text).toBe('token:client-a');
    expect(anonymous.text).toBe('token:anonymous');
    expect(fallback.text).toBe('token-ip:203.0.113.7');
  });
});
