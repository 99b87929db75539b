import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type express from 'express';
import { createApp } from '../app.js';
import { AuthService } from '../../../application/auth/authService.js';
import { RegisterUseCase } from '../../../application/auth/register.js';
import { InMemoryUserStore } from '../../../application/auth/__tests__/fakes.js';
import { PasswordCredentialVerifier } from '../../security/credentialVerifier.js';
import { JwtTokenIssuer } from '../../security/jwtTokenIssuer.js';
import { createLogger } from '../../logging/logger.js';

describe('Auth API', () => {
  let app: express.Application;
  let store: InMemoryUserStore;

  const registration = {
    email: 'loginuser@example.com',
    password: 'password123',
    firstName: 'Login',
    lastName: 'User',
  };

  const register = () => request(app).post('/api/auth/register').send(registration);
  const login = (password = registration.password) =>
    request(app).post('/api/auth/login').send({ email: registration.email, password });

  beforeEach(() => {
    store = new InMemoryUserStore();
    const tokenIssuer = new JwtTokenIssuer({
      secret: 'test-secret-test-secret',
      issuer: 'test-issuer',
      accessTokenTtlSeconds: 900,
    });
    const logger = createLogger({ silent: true });
    app = createApp({
      authService: new AuthService(new PasswordCredentialVerifier(store), tokenIssuer, store, {
        logger,
      }),
      registerUseCase: new RegisterUseCase(store),
      tokenIssuer,
      healthCheck: async () => undefined,
      logger,
      publicUrl: 'https://auth.example.test',
    });
  });

  describe('GET /docs.json', () => {
    it('advertises the configured public URL as the server', async () => {
      const response = await request(app).get('/docs.json');

      expect(response.status).toBe(200);
      expect(response.body.servers).toEqual([{ url: 'https://auth.example.test' }]);
      expect(response.body.paths).toHaveProperty(['/api/auth/login']);
    });
  });

  describe('POST /api/auth/register', () => {
    it('should register a new user', async () => {
      const response = await register();

      expect(response.status).toBe(201);
      expect(response.body).toHaveProperty('userId');
      expect(response.body).toHaveProperty('email', 'loginuser@example.com');
    });

    it('should reject invalid email', async () => {
      const response = await request(app)
        .post('/api/auth/register')
        .send({ ...registration, email: 'invalid-email' });

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('code', 'VALIDATION_ERROR');
      expect(response.body).toHaveProperty('message', 'Validation failed');
      expect(response.body.details.issues[0].path).toBe('email');
    });

    it('should reject short password', async () => {
      const response = await request(app)
        .post('/api/auth/register')
        .send({ ...registration, password: 'short' });

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('code', 'VALIDATION_ERROR');
    });

    it('should reject duplicate email', async () => {
      await register();
      const response = await register();

      expect(response.status).toBe(409);
      expect(response.body).toEqual({
        code: 'User.DuplicateEmail',
        message: 'Email is already registered',
      });
    });
  });

  describe('POST /api/auth/login', () => {
    beforeEach(async () => {
      await register();
    });

    it('should login with valid credentials', async () => {
      const response = await login();

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('email', 'loginuser@example.com');
      expect(response.body).toHaveProperty('firstName', 'Login');
      expect(response.body).toHaveProperty('lastName', 'User');
      expect(response.body).toHaveProperty('accessTokenExpiresIn', 900);
      expect(typeof response.body.accessToken).toBe('string');
      expect(typeof response.body.refreshToken).toBe('string');
      expect(Number.isNaN(Date.parse(response.body.refreshTokenExpiresOn))).toBe(false);
    });

    it('should reject unknown email and wrong password identically', async () => {
      const unknown = await request(app)
        .post('/api/auth/login')
        .send({ email: 'nonexistent@example.com', password: 'password123' });
      const wrong = await login('wrongpassword');

      expect(unknown.status).toBe(401);
      expect(wrong.status).toBe(401);
      expect(unknown.body).toEqual({
        code: 'User.InvalidCredentials',
        message: 'Invalid Email or Password',
      });
      expect(wrong.body).toEqual(unknown.body);
    });

    it('should reject invalid email format', async () => {
      const response = await request(app)
        .post('/api/auth/login')
        .send({ email: 'invalid-email', password: 'password123' });

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('code', 'VALIDATION_ERROR');
    });
  });

  describe('refresh tokens', () => {
    let tokens: { accessToken: string; refreshToken: string };

    beforeEach(async () => {
      await register();
      const response = await login();
      tokens = {
        accessToken: response.body.accessToken,
        refreshToken: response.body.refreshToken,
      };
    });

    it('should issue a new pair and consume the old refresh token', async () => {
      const renewed = await request(app).post('/api/auth/refresh').send(tokens);
      const replayed = await request(app).post('/api/auth/refresh').send(tokens);

      expect(renewed.status).toBe(200);
      expect(renewed.body.refreshToken).not.toBe(tokens.refreshToken);
      expect(replayed.status).toBe(401);
      expect(replayed.body).toEqual({
        code: 'User.InvalidRefreshToken',
        message: 'Invalid or Expired Refresh Token',
      });
    });

    it('should revoke a refresh token', async () => {
      const revoked = await request(app).post('/api/auth/revoke').send(tokens);
      const renewed = await request(app).post('/api/auth/refresh').send(tokens);

      expect(revoked.status).toBe(204);
      expect(revoked.text).toBe('');
      expect(renewed.status).toBe(401);
      expect(renewed.body).toHaveProperty('code', 'User.InvalidRefreshToken');
    });

    it('should reject a forged access token', async () => {
      const response = await request(app)
        .post('/api/auth/refresh')
        .send({ ...tokens, accessToken: 'invalid-token' });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ code: 'User.InvalidToken', message: 'Invalid Token' });
    });
  });

  describe('GET /api/auth/me', () => {
    it('should allow access with a valid access token', async () => {
      const registered = await register();
      const loggedIn = await login();

      const response = await request(app)
        .get('/api/auth/me')
        .set('Authorization', `Bearer ${loggedIn.body.accessToken}`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        userId: registered.body.userId,
        email: 'loginuser@example.com',
      });
    });

    it('should reject request without token', async () => {
      const response = await request(app).get('/api/auth/me');

      expect(response.status).toBe(401);
      expect(response.body).toHaveProperty('code', 'UNAUTHORIZED');
    });

    it('should reject request with invalid token', async () => {
      const response = await request(app)
        .get('/api/auth/me')
        .set('Authorization', 'Bearer invalid-token');

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ code: 'UNAUTHORIZED', message: 'Invalid or expired token' });
    });

    it('should reject request with malformed header', async () => {
      const response = await request(app)
        .get('/api/auth/me')
        .set('Authorization', 'InvalidFormat token');

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        code: 'UNAUTHORIZED',
        message: 'Missing or invalid authorization header',
      });
    });
  });

  describe('Rate limiting', () => {
    it('should enforce rate limit on login', async () => {
      await register();

      const responses = [];
      for (let i = 0; i < 11; i++) {
        responses.push(await login('wrongpassword'));
      }

      expect(responses.slice(0, 10).every((r) => r.status === 401)).toBe(true);
      expect(responses[10].status).toBe(429);
      expect(responses[10].body).toHaveProperty('code', 'RATE_LIMITED');
    });
  });
});
