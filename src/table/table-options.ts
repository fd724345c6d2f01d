/**
 * Table Options - defaults and validation for table construction
 */

import Ajv2020 from 'ajv/dist/2020.js';
import { RegistryError } from '../registry/errors.js';

export const DEFAULT_TABLE_NAME = 'command_registry';

export interface TableOptions {
  /** Enumerate keys in ascending order instead of insertion order */
  orderedKeys: boolean;
  /** Callers other than the owner may write through the published handle */
  publiclyWritable: boolean;
  /** Register the table in the process-wide directory under its name */
  globallyNamed: boolean;
}

export const DEFAULT_TABLE_OPTIONS: Readonly<TableOptions> = {
  orderedKeys: true,
  publiclyWritable: true,
  globallyNamed: true,
};

const TABLE_OPTIONS_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  properties: {
    orderedKeys: { type: 'boolean' },
    publiclyWritable: { type: 'boolean' },
    globallyNamed: { type: 'boolean' },
  },
  additionalProperties: false,
};

const TABLE_NAME_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'string',
  minLength: 1,
};

const ajv = new Ajv2020({ allErrors: true, strict: false });
const validateOptions = ajv.compile<Partial<TableOptions>>(TABLE_OPTIONS_SCHEMA);
const validateName = ajv.compile<string>(TABLE_NAME_SCHEMA);

/**
 * Validate a table name and partial options, filling gaps from the defaults.
 * Throws RegistryError(INVALID_TABLE_OPTIONS) on anything else.
 */
export function resolveTableOptions(name: unknown, options: unknown = {}): { name: string; options: TableOptions } {
  if (!validateName(name)) {
    throw RegistryError.invalidTableOptions([{ path: '/name', message: 'must be a non-empty string' }]);
  }

  if (!validateOptions(options)) {
    throw RegistryError.invalidTableOptions(
      (validateOptions.errors || []).map((err) => ({
        path: err.instancePath || '/',
        message: err.message || 'Unknown validation error',
      }))
    );
  }

  return {
    name,
    options: {
      orderedKeys: options.orderedKeys ?? DEFAULT_TABLE_OPTIONS.orderedKeys,
      publiclyWritable: options.publiclyWritable ?? DEFAULT_TABLE_OPTIONS.publiclyWritable,
      globallyNamed: options.globallyNamed ?? DEFAULT_TABLE_OPTIONS.globallyNamed,
    },
  };
}
