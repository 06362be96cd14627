import { Request, Response, NextFunction } from 'express';
import { validationResult } from 'express-validator';
import { ApiError } from '../../utils/errorHandler';

export const runValidation = (req: Request, _res: Response, next: NextFunction) => {
  const errors = validationResult(req);
  if (!errors.isEmpty()) return next(new ApiError('Validation failed', 400, errors.array(), 'BAD_REQUEST'));
  next();
};
