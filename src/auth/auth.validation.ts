import { body } from 'express-validator';

export const loginValidation = [
  body('pin')
    .exists({ values: 'null' })
    .withMessage('PIN is required')
    .isString()
    .withMessage('PIN must be a string')
    .isLength({ min: 1, max: 32 })
    .withMessage('PIN must be between 1 and 32 characters'),
];
