import { body } from 'express-validator';
import { runValidation } from '../runValidation';

export const validateRecordUsage = [
  body('actionType').isString().trim().isLength({ min: 1, max: 64 }).matches(/^[A-Za-z0-9_.:-]+$/),
  runValidation,
];
