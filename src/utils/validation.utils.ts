import Joi from 'joi';
import { BadRequestError } from '../middleware/error.middleware';
import {
  AdvertisementSearchQuery,
  CreateAdvertisementInput,
  UpdateAdvertisementInput,
} from '../types/advertisement.types';
import {
  CreateUserInput,
  LoginRequest,
  USER_ROLES,
  UpdateUserInput,
} from '../types/user.types';

/**
 * Validation schema options
 */
const validationOptions: Joi.ValidationOptions = {
  abortEarly: false, // Return all errors, not just first
  allowUnknown: true,
  stripUnknown: true, // Remove unknown properties
};

/**
 * Validate untrusted input against a schema
 * Returns the converted value or throws BadRequestError listing every problem
 */
export function validateInput<T>(schema: Joi.ObjectSchema<T>, input: unknown): T {
  const { error, value } = schema.validate(input ?? {}, validationOptions);

  if (error) {
    throw new BadRequestError(error.details.map((detail) => detail.message).join('; '));
  }

  return value;
}

// Upper bound of the INTEGER id columns
const MAX_ID = 2147483647;

/**
 * Parse a positive integer path id
 */
export function parseIdParam(raw: string | undefined, label: string = 'id'): number {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    throw new BadRequestError(`${label} must be a positive integer`);
  }

  const id = Number(raw);
  if (!Number.isSafeInteger(id) || id <= 0 || id > MAX_ID) {
    throw new BadRequestError(`${label} must be a positive integer`);
  }

  return id;
}

/**
 * ============================================================================
 * VALIDATION SCHEMAS
 * ============================================================================
 */

const username = Joi.string().min(3).max(50);
const email = Joi.string().email().max(100);
const password = Joi.string().min(6).max(1024);

export const authSchemas = {
  login: Joi.object<LoginRequest>({
    username: Joi.string().required(),
    password: Joi.string().required(),
  }),
};

export const userSchemas = {
  create: Joi.object<CreateUserInput>({
    username: username.required(),
    email: email.required(),
    password: password.required(),
    role: Joi.string().valid(...USER_ROLES),
  }),

  update: Joi.object<UpdateUserInput>({
    username,
    email,
    password,
  }),
};

const title = Joi.string().min(1).max(100);
const description = Joi.string().min(1).max(1000);
const price = Joi.number().positive();

export const advertisementSchemas = {
  create: Joi.object<CreateAdvertisementInput>({
    title: title.required(),
    description: description.required(),
    price: price.required(),
  }),

  update: Joi.object<UpdateAdvertisementInput>({
    title,
    description,
    price,
  }),

  search: Joi.object<AdvertisementSearchQuery>({
    title: Joi.string().max(100).allow(''),
    description: Joi.string().max(1000).allow(''),
    min_price: Joi.number().min(0),
    max_price: Joi.number().min(0),
    offset: Joi.number().integer().min(0),
    limit: Joi.number().integer().min(1),
  }),
};
