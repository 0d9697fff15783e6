import { Router } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { loadConfig } from '../config.js';
import { badRequest, notFound } from '../errors.js';
import { getParser } from '../importing/parsers/index.js';
import { importTransactions } from '../importing/services/transaction-import.js';
import { createLogger } from '../logger.js';
import { accountInputSchema, accountPatchSchema, createAccount, getAccount, listAccounts, updateAccount } from '../services/accounts.js';
import { listImportBatches } from '../services/import-batches.js';
import { listTransactions, transactionFilterSchema } from '../services/transactions.js';
import { asyncHandler } from '../utils/async-handler.js';

export const router = Router();

const logger = createLogger('api');

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    files: 1,
    fileSize: loadConfig().IMPORT_MAX_FILE_SIZE,
  },
});

const idParamSchema = z.object({
  id: z.coerce.number().int().positive(),
});

const importBodySchema = z.object({
  broker: z.string().trim().min(1),
  format: z.string().trim().min(1),
  dryRun: z
    .union([z.string(), z.boolean()])
    .optional()
    .transform((value) => {
      if (value === undefined) return false;
      if (typeof value === 'boolean') return value;
      const normalized = value.toLowerCase();
      return normalized === 'true' || normalized === '1' || normalized === 'on';
    }),
});

async function requireAccount(id: number) {
  const account = await getAccount(id);
  if (!account) {
    throw notFound('account not found');
  }
  return account;
}

router.get(
  '/',
  asyncHandler(async (_req, res) => {
    res.json(await listAccounts());
  })
);

router.post(
  '/',
  asyncHandler(async (req, res) => {
    const body = accountInputSchema.parse(req.body);
    const account = await createAccount(body);
    res.status(201).json(account);
  })
);

router.get(
  '/:id',
  asyncHandler(async (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    res.json(await requireAccount(id));
  })
);

router.patch(
  '/:id',
  asyncHandler(async (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    const patch = accountPatchSchema.parse(req.body);
    const account = await updateAccount(id, patch);
    if (!account) {
      throw notFound('account not found');
    }
    res.json(account);
  })
);

router.get(
  '/:id/transactions',
  asyncHandler(async (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    const filter = transactionFilterSchema.parse(req.query);
    await requireAccount(id);
    res.json(await listTransactions(id, filter));
  })
);

router.get(
  '/:id/imports',
  asyncHandler(async (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    await requireAccount(id);
    res.json(await listImportBatches(id));
  })
);

router.post(
  '/:id/imports',
  upload.single('file'),
  asyncHandler(async (req, res) => {
    const { id } = idParamSchema.parse(req.params);
    const parsedBody = importBodySchema.safeParse(req.body);
    if (!parsedBody.success) {
      throw badRequest('invalid request', parsedBody.error.flatten());
    }
    const { broker, format, dryRun } = parsedBody.data;

    const file = req.file;
    if (!file) {
      throw badRequest('a CSV file is required');
    }

    await requireAccount(id);
    const parse = getParser(broker, format);
    const { transactions, issues } = parse(file.buffer.toString('utf8'));
    if (issues.length) {
      logger.warn(`${file.originalname}: ${issues.length} rows could not be parsed`);
    }

    if (dryRun) {
      res.json({ parsed: transactions.length, transactions, issues });
      return;
    }

    const result = await importTransactions(id, transactions, {
      broker: broker.toLowerCase(),
      formatName: format.toLowerCase(),
      filename: file.originalname,
    });

    res.status(result.batchId === null ? 200 : 201).json({
      batchId: result.batchId,
      parsed: transactions.length,
      imported: result.created.length,
      skipped: result.skipped,
      issues,
    });
  })
);
