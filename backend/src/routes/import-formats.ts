import { Router } from 'express';
import { listImportFormats } from '../importing/parsers/index.js';

export const router = Router();

router.get('/', (_req, res) => {
  res.json(listImportFormats());
});
