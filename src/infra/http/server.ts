import { AuthService } from '../../application/auth/authService.js';
import { RegisterUseCase } from '../../application/auth/register.js';
import { loadConfig } from '../config/config.js';
import { createPool } from '../db/pool.js';
import { UserRepo } from '../db/userRepo.js';
import { createLogger } from '../logging/logger.js';
import { PasswordCredentialVerifier } from '../security/credentialVerifier.js';
import { JwtTokenIssuer } from '../security/jwtTokenIssuer.js';
import { createApp } from './app.js';

const config = loadConfig();
const logger = createLogger({ level: config.logLevel });
const pool = createPool({ connectionString: config.databaseUrl, logger });

const userRepo = new UserRepo(pool);
const tokenIssuer = new JwtTokenIssuer(config.jwt);
const authService = new AuthService(
  new PasswordCredentialVerifier(userRepo),
  tokenIssuer,
  userRepo,
  { logger }
);

const app = createApp({
  authService,
  registerUseCase: new RegisterUseCase(userRepo),
  tokenIssuer,
  healthCheck: () => pool.query('SELECT 1'),
  logger,
  publicUrl: config.publicUrl,
});

const server = app.listen(config.port, () => {
  logger.info(`Server running on port ${config.port}`);
  logger.info(`API docs: ${config.publicUrl}/docs`);
});

function shutdown(signal: string): void {
  logger.info('Shutting down', { signal });
  server.close(() => {
    pool
      .end()
      .catch((error: unknown) => {
        logger.error('Failed to close database pool', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exitCode = 1;
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
