import type { NextFunction, Request, Response } from 'express';
import { body, param, query, validationResult } from 'express-validator';
import { PARK_STATUSES } from '../../types/park.js';

const handleValidationErrors = (req: Request, res: Response, next: NextFunction) => {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
        return res.status(400).json({
            error: 'Validation failed',
            code: 'VALIDATION_ERROR',
            errors: errors.array(),
        });
    }
    next();
};

const idParam = (name: string) => param(name).isUUID().withMessage(`${name} must be a UUID`);

export const validateId = [idParam('id'), handleValidationErrors];

export const validateParkQuery = [
    query('status').optional().isIn(PARK_STATUSES).withMessage(`status must be one of ${PARK_STATUSES.join(', ')}`),
    handleValidationErrors,
];

export const validateParkCreation = [
    body('name').isString().trim().isLength({ min: 1, max: 120 }).withMessage('Name is required (max 120 characters)'),
    body('description').optional({ values: 'null' }).isString().isLength({ max: 2000 }).withMessage('Description must be at most 2000 characters'),
    body('latitude').isFloat({ min: -90, max: 90 }).withMessage('Latitude must be a valid number between -90 and 90').toFloat(),
    body('longitude').isFloat({ min: -180, max: 180 }).withMessage('Longitude must be a valid number between -180 and 180').toFloat(),
    body('address').optional({ values: 'null' }).isString().isLength({ max: 300 }).withMessage('Address must be at most 300 characters'),
    handleValidationErrors,
];

export const validateStatusUpdate = [
    idParam('id'),
    body('status').isIn(PARK_STATUSES).withMessage(`status must be one of ${PARK_STATUSES.join(', ')}`),
    handleValidationErrors,
];

export const validateVote = [
    idParam('id'),
    body('direction').isIn(['up', 'down']).withMessage('direction must be "up" or "down"'),
    handleValidationErrors,
];

export const validatePhotoUpload = [
    idParam('id'),
    body('url').isURL({ protocols: ['http', 'https'], require_protocol: true }).withMessage('url must be an http(s) URL'),
    handleValidationErrors,
];

export const validateComment = [
    idParam('id'),
    body('content').isString().trim().isLength({ min: 1, max: 1000 }).withMessage('Content is required (max 1000 characters)'),
    handleValidationErrors,
];

export const validateTag = [
    idParam('id'),
    body('tag').isString().trim().isLength({ min: 1, max: 40 }).withMessage('Tag is required (max 40 characters)'),
    handleValidationErrors,
];

export const validateFlag = (field: 'approved' | 'reported') => [
    idParam('id'),
    body(field).isBoolean({ strict: true }).withMessage(`${field} must be a boolean`).toBoolean(true),
    handleValidationErrors,
];
