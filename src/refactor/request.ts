import * as fs from 'node:fs';
import { z } from 'zod';
import { RequestValidationError } from '../core/errors.js';
import { createFieldOperation } from './field-operation.js';
import { createServiceInfo } from './layout.js';
import type { ModifyRequest } from './types.js';

const TargetServiceSchema = z.object({
  name: z.string().regex(/^[A-Za-z_]\w*$/, 'must be a valid package segment'),
  table: z.string().regex(/^[A-Za-z_]\w*$/, 'must be a valid table name'),
  entity: z.string().regex(/^[A-Z]\w*$/, 'must be a class name').optional(),
  description: z.string().optional(),
});

const OptionsSchema = z.object({
  dry_run: z.boolean().optional(),
  auto_confirm: z.boolean().optional(),
});

const REQUIRED_KEYS = ['operation_type', 'target_service', 'field_operations'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate the structure of an operations request and build its field operations.
 */
export function parseModifyRequest(data: unknown): ModifyRequest {
  if (!isRecord(data)) {
    throw new RequestValidationError('Operations request must be a JSON object');
  }

  for (const key of REQUIRED_KEYS) {
    if (!(key in data)) {
      throw new RequestValidationError(`Missing required field: ${key}`);
    }
  }

  if (data.operation_type !== 'modify_service') {
    throw new RequestValidationError(`Invalid operation_type: ${String(data.operation_type)}`);
  }

  const target = data.target_service;
  if (!isRecord(target)) {
    throw new RequestValidationError('target_service must be an object');
  }
  for (const key of ['name', 'table']) {
    if (!(key in target)) {
      throw new RequestValidationError(`Missing required target_service field: ${key}`);
    }
  }
  const service = TargetServiceSchema.safeParse(target);
  if (!service.success) {
    const issue = service.error.issues[0];
    throw new RequestValidationError(`Invalid target_service.${issue.path.join('.')}: ${issue.message}`);
  }

  const rawOperations = data.field_operations;
  if (!Array.isArray(rawOperations)) {
    throw new RequestValidationError('field_operations must be an array');
  }
  if (rawOperations.length === 0) {
    throw new RequestValidationError('No field operations specified');
  }

  const options = OptionsSchema.safeParse(data.options ?? {});
  if (!options.success) {
    const issue = options.error.issues[0];
    throw new RequestValidationError(`Invalid options.${issue.path.join('.')}: ${issue.message}`);
  }

  const operations = rawOperations.map((raw, index) => {
    try {
      return createFieldOperation(raw);
    } catch (error) {
      if (error instanceof RequestValidationError) {
        throw new RequestValidationError(`field_operations[${index}]: ${error.message}`, { cause: error });
      }
      throw error;
    }
  });

  return {
    service: createServiceInfo(service.data),
    operations,
    options: {
      dryRun: options.data.dry_run ?? false,
      autoConfirm: options.data.auto_confirm ?? false,
    },
  };
}

/**
 * Read and parse an operations request file
 */
export function loadModifyRequest(filePath: string): ModifyRequest {
  if (!fs.existsSync(filePath)) {
    throw new RequestValidationError(`Operations file not found: ${filePath}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new RequestValidationError(`Operations file is not valid JSON: ${filePath}`, { cause: error });
  }
  return parseModifyRequest(data);
}
