/**
 * Input Loader
 *
 * Reads a local JSON file and validates it against one of the input schemas.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import _Ajv, { type ValidateFunction } from 'ajv';
import type {
  AddressListInputFile,
  OrderInputFile,
  ProductInputFile,
  ShippingNoteInputFile,
} from '../../types/input.types.js';
import { InputError, errorMessage } from '../errors.js';
import { Logger } from '../logger.js';
import {
  addressListInputSchema,
  orderInputSchema,
  productInputSchema,
  shippingNoteInputSchema,
} from './input-schemas.js';

// ESM compatibility for Ajv
const Ajv = _Ajv as unknown as typeof _Ajv.default;

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

export const validateOrderInput: ValidateFunction<OrderInputFile> = ajv.compile<OrderInputFile>(orderInputSchema);
export const validateShippingNoteInput: ValidateFunction<ShippingNoteInputFile> =
  ajv.compile<ShippingNoteInputFile>(shippingNoteInputSchema);
export const validateProductInput: ValidateFunction<ProductInputFile> =
  ajv.compile<ProductInputFile>(productInputSchema);
export const validateAddressListInput: ValidateFunction<AddressListInputFile> =
  ajv.compile<AddressListInputFile>(addressListInputSchema);

/**
 * Validates already-parsed content.
 */
export function checkInput<T>(content: unknown, validate: ValidateFunction<T>, source: string): T {
  if (!validate(content)) {
    const details = (validate.errors ?? []).map(
      (error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`,
    );
    throw new InputError(`${source} is not a valid input file: ${details.join('; ')}`);
  }
  return content;
}

export async function readInputFile<T>(filePath: string, validate: ValidateFunction<T>): Promise<T> {
  const resolved = path.resolve(filePath);
  let text: string;
  try {
    text = await fs.readFile(resolved, 'utf-8');
  } catch (error) {
    throw new InputError(`Cannot read ${resolved}: ${errorMessage(error)}`, { cause: error });
  }

  let content: unknown;
  try {
    content = JSON.parse(text);
  } catch (error) {
    throw new InputError(`${resolved} is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }

  Logger.debug(`Loaded input from ${resolved}`);
  return checkInput(content, validate, resolved);
}
