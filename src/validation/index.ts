/**
 * Public exports for argument validation.
 */

export {
  validateName,
  validateEmail,
  validateUserId,
  validateLimit,
  validateOffset,
  validateUpdateFields,
  validateArgs,
  DEFAULT_LIMIT,
  DEFAULT_OFFSET,
  MAX_LIMIT,
  MESSAGES,
} from './userValidation.js';
