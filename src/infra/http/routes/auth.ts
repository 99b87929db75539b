import { Router } from 'express';
import { z } from 'zod';
import type { AuthService } from '../../../application/auth/authService.js';
import type { TokenIssuer } from '../../../application/auth/ports.js';
import type { RegisterUseCase } from '../../../application/auth/register.js';
import { createLoginRateLimiter } from '../middleware/rateLimit.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { authMiddleware, AuthRequest } from '../middleware/auth.js';
import { sendOutcome } from '../outcome.js';

/**
 * @openapi
 * components:
 *   schemas:
 *     AuthResponse:
 *       type: object
 *       properties:
 *         userId: { type: string }
 *         email: { type: string, format: email }
 *         firstName: { type: string }
 *         lastName: { type: string }
 *         accessToken: { type: string }
 *         accessTokenExpiresIn: { type: integer, description: Seconds }
 *         refreshToken: { type: string }
 *         refreshTokenExpiresOn: { type: string, format: date-time }
 *     TokenPair:
 *       type: object
 *       required: [accessToken, refreshToken]
 *       properties:
 *         accessToken: { type: string }
 *         refreshToken: { type: string }
 *
 * /api/auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password, firstName, lastName]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 8 }
 *               firstName: { type: string }
 *               lastName: { type: string }
 *     responses:
 *       201:
 *         description: User created
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Email already registered (User.DuplicateEmail)
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive an access token and a refresh token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/AuthResponse'
 *       401:
 *         description: Invalid credentials (User.InvalidCredentials)
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/refresh:
 *   post:
 *     tags: [Auth]
 *     summary: Exchange a refresh token for a new token pair
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/TokenPair'
 *     responses:
 *       200:
 *         description: New token pair; the presented refresh token is consumed
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/AuthResponse'
 *       401:
 *         description: Invalid access token or invalid/expired refresh token
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/revoke:
 *   post:
 *     tags: [Auth]
 *     summary: Revoke a refresh token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/TokenPair'
 *     responses:
 *       204:
 *         description: Revoked
 *       401:
 *         description: Invalid access token or invalid/expired refresh token
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/me:
 *   get:
 *     tags: [Auth]
 *     summary: Identity carried by the bearer access token
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Authenticated identity
 *       401:
 *         description: Missing, invalid or expired token
 */

const registerBodySchema = z.object({
  email: z.string().email(),
  password: z.string().min(8),
  firstName: z.string().min(1).max(100),
  lastName: z.string().min(1).max(100),
});

const loginBodySchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
});

const tokenPairBodySchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1),
});

export interface AuthRouteDependencies {
  authService: AuthService;
  registerUseCase: RegisterUseCase;
  tokenIssuer: TokenIssuer;
}

export function createAuthRoutes(deps: AuthRouteDependencies) {
  const router = Router();
  const credentialRateLimiter = createLoginRateLimiter();

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      sendOutcome(res, await deps.registerUseCase.execute(body), 201);
    })
  );

  router.post(
    '/login',
    credentialRateLimiter,
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res, signal) => {
      const body = loginBodySchema.parse(req.body);
      sendOutcome(res, await deps.authService.issueToken(body.email, body.password, signal));
    })
  );

  router.post(
    '/refresh',
    credentialRateLimiter,
    validate({ body: tokenPairBodySchema }),
    asyncHandler(async (req, res, signal) => {
      const body = tokenPairBodySchema.parse(req.body);
      sendOutcome(
        res,
        await deps.authService.renewToken(body.accessToken, body.refreshToken, signal)
      );
    })
  );

  router.post(
    '/revoke',
    validate({ body: tokenPairBodySchema }),
    asyncHandler(async (req, res, signal) => {
      const body = tokenPairBodySchema.parse(req.body);
      sendOutcome(
        res,
        await deps.authService.revokeToken(body.accessToken, body.refreshToken, signal)
      );
    })
  );

  router.get('/me', authMiddleware(deps.tokenIssuer), (req: AuthRequest, res) => {
    res.json({ userId: req.userId, email: req.userEmail });
  });

  return router;
}
