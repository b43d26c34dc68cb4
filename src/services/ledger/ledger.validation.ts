import { body, query } from 'express-validator';

import { LEDGER_CONFIG } from '../../config/environments';

export const transactionValidation = [
  body('amount')
    .exists({ values: 'null' })
    .withMessage('Amount is required')
    .bail()
    .custom((value: unknown) => typeof value === 'number' || typeof value === 'string')
    .withMessage('Amount must be a number')
    .bail()
    .isInt({ min: 0, max: Number.MAX_SAFE_INTEGER })
    .withMessage('Amount must be a non-negative integer')
    .toInt(),
];

export const historyQueryValidation = [
  query('limit')
    .optional()
    .not()
    .isArray()
    .withMessage('Limit must be a single value')
    .bail()
    .isInt({ min: 1, max: LEDGER_CONFIG.maxHistoryLimit })
    .withMessage(`Limit must be between 1 and ${LEDGER_CONFIG.maxHistoryLimit}`)
    .toInt(),
];
