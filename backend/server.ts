import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import { z } from 'zod';

import type { AppConfig } from './config';
import { and, contains, eq, matchAll, or, type DocumentFilter, type DocumentStore } from './database';
import { runDiagnostics } from './diagnostics';
import { DatabaseUnavailableError, createErrorResponse, errorMessage, toHttpError } from './errors';
import {
  PRODUCT_COLLECTION,
  createProductInputSchema,
  productSchema,
  searchProductsInputSchema,
  type SearchProductsInput,
} from './schema';
import { seedProducts } from './seed';

export const MAX_PRODUCTS_PER_PAGE = 100;

// Errors raised by express.json() carry an HTTP status and a `type` such as `entity.too.large`
const bodyParserErrorSchema = z.object({
  status: z.number().int().min(400).max(499),
  type: z.string(),
});

const BODY_ERROR_CODES: Partial<Record<string, string>> = {
  'entity.parse.failed': 'INVALID_JSON',
  'entity.too.large': 'PAYLOAD_TOO_LARGE',
};

const BODY_ERROR_MESSAGES: Partial<Record<string, string>> = {
  'entity.parse.failed': 'Malformed JSON body',
  'entity.too.large': 'Request body exceeds 5mb',
};

export interface AppDependencies {
  store: DocumentStore | null;
  config: AppConfig;
}

function requireStore(store: DocumentStore | null): DocumentStore {
  if (store === null) {
    throw new DatabaseUnavailableError();
  }
  return store;
}

export function buildProductFilter({ animal, q }: SearchProductsInput): DocumentFilter {
  const filters: DocumentFilter[] = [];

  if (animal) {
    filters.push(eq('animal', animal));
  }

  if (q) {
    filters.push(or(contains('title', q), contains('description', q), contains('tags', q)));
  }

  return filters.length === 0 ? matchAll() : and(...filters);
}

function sendError(res: Response, context: string, error: unknown, storageStatus?: number): void {
  const { status, body } = toHttpError(error, storageStatus);
  if (status >= 500 || body.error_code === 'DATABASE_ERROR') {
    console.error(`${context} error:`, error);
  }
  res.status(status).json(body);
}

export function createApp({ store, config }: AppDependencies): Express {
  const app = express();

  // Middleware setup
  app.use(cors({
    origin: true,
    credentials: true,
  }));

  app.use(express.json({ limit: '5mb' }));

  app.use(morgan(':method :url :status :res[content-length] - :response-time ms', {
    skip: () => config.nodeEnv === 'test',
  }));

  // ===== HEALTH CHECK =====

  app.get('/', (_req, res) => {
    res.json({ message: 'Extravagant Pet Shop Backend is live!' });
  });

  /*
    Database diagnostics endpoint
    Reports connectivity and up to ten collection names; always answers 200
  */
  app.get('/test', async (_req, res) => {
    res.json(await runDiagnostics(store, config.databaseUrl));
  });

  // ===== PRODUCT ENDPOINTS =====

  /*
    List products endpoint
    Optional `animal` (exact match) and `q` (substring of title, description or tags)
  */
  app.get('/api/products', async (req, res) => {
    try {
      const filter = buildProductFilter(searchProductsInputSchema.parse(req.query));
      const items = await requireStore(store).getDocuments(PRODUCT_COLLECTION, filter, MAX_PRODUCTS_PER_PAGE);

      res.json({ items });
    } catch (error) {
      sendError(res, 'List products', error);
    }
  });

  /*
    Create product endpoint
    The loose request shape fills in defaults; the canonical schema decides what is stored
  */
  app.post('/api/products', async (req, res) => {
    try {
      const input = createProductInputSchema.parse(req.body);
      const product = productSchema.parse(input);

      const id = await requireStore(store).createDocument(PRODUCT_COLLECTION, product);

      res.status(201).json({ id });
    } catch (error) {
      // Insert failures answer 400 as well
      sendError(res, 'Create product', error, 400);
    }
  });

  /*
    Seed endpoint
    Inserts the demo catalog when the product collection is empty
  */
  app.post('/api/seed', async (_req, res) => {
    try {
      res.json(await seedProducts(requireStore(store)));
    } catch (error) {
      sendError(res, 'Seed products', error);
    }
  });

  app.use((_req, res) => {
    res.status(404).json(createErrorResponse('Route not found', 'NOT_FOUND'));
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const bodyError = bodyParserErrorSchema.safeParse(error);
    if (bodyError.success) {
      const { status, type } = bodyError.data;
      res.status(status).json(createErrorResponse(
        BODY_ERROR_MESSAGES[type] ?? errorMessage(error),
        BODY_ERROR_CODES[type] ?? 'INVALID_REQUEST_BODY'
      ));
      return;
    }
    console.error('Unhandled error:', error);
    res.status(500).json(createErrorResponse('Internal server error', 'INTERNAL_SERVER_ERROR'));
  });

  return app;
}
