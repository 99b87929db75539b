import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';
import { createSwaggerSpec } from '../swagger.js';

export function createSwaggerRoutes(serverUrl: string) {
  const router = Router();
  const spec = createSwaggerSpec(serverUrl);

  router.get('/docs.json', (_req, res) => {
    res.json(spec);
  });
  router.use('/docs', swaggerUi.serve);
  router.get('/docs', swaggerUi.setup(spec, {
    customCss: '.swagger-ui .topbar { display: none }',
  }));

  return router;
}
