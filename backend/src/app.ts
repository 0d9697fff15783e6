import express, { type Express } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { router as healthRouter } from './routes/health.js';
import { router as accountsRouter } from './routes/accounts.js';
import { router as importFormatsRouter } from './routes/import-formats.js';
import { errorHandler } from './middleware/error-handler.js';

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const openApiPath = path.resolve(currentDir, '../openapi/openapi.yaml');

function loadOpenApiDocument(): Record<string, unknown> {
  const document: unknown = YAML.parse(readFileSync(openApiPath, 'utf8'));
  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    throw new Error(`invalid OpenAPI document at ${openApiPath}`);
  }
  return { ...document };
}

type AppOptions = {
  accessLog?: boolean;
};

export function createApp({ accessLog = true }: AppOptions = {}): Express {
  const openApiDocument = loadOpenApiDocument();

  const app = express();
  app.set('trust proxy', true);
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  if (accessLog) {
    app.use(morgan('combined'));
  }

  app.use('/api/v1/health', healthRouter);
  app.use('/api/v1/accounts', accountsRouter);
  app.use('/api/v1/import-formats', importFormatsRouter);

  app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
  app.get('/api/v1/openapi.json', (_req, res) => {
    res.json(openApiDocument);
  });

  app.use(errorHandler);
  return app;
}
