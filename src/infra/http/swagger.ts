import swaggerJsdoc from 'swagger-jsdoc';

const errorResponseSchema = {
  type: 'object',
  required: ['code', 'message'],
  properties: {
    code: {
      type: 'string',
      description: 'Domain errors use Entity.Reason, infrastructure errors SCREAMING_CASE',
      example: 'User.InvalidCredentials',
    },
    message: { type: 'string', example: 'Invalid Email or Password' },
    details: { type: 'object', additionalProperties: true },
  },
};

/**
 * OpenAPI document for the auth endpoints, advertising `serverUrl` as the
 * single server. Paths come from the @openapi blocks in the route files.
 */
export function createSwaggerSpec(serverUrl: string): object {
  return swaggerJsdoc({
    definition: {
      openapi: '3.0.0',
      info: {
        title: 'Auth Outcome Service API',
        version: '1.0.0',
        description: 'Login, refresh-token rotation and revocation',
      },
      servers: [{ url: serverUrl }],
      components: {
        securitySchemes: {
          bearerAuth: { type: 'http', scheme: 'bearer', bearerFormat: 'JWT' },
        },
        schemas: { ErrorResponse: errorResponseSchema },
      },
      tags: [
        { name: 'Auth', description: 'Token issue, renewal and revocation' },
        { name: 'Health', description: 'Liveness and database reachability' },
      ],
    },
    apis: ['./src/infra/http/routes/*.ts'],
  });
}
