import { z } from 'zod';
import { RequestValidationError } from '../core/errors.js';
import type { FieldAction, FieldOperation } from './types.js';

export const FIELD_ACTIONS: readonly FieldAction[] = ['add', 'update', 'remove'];

const ValidationSchema = z.object({
  required: z.boolean().optional(),
  maxLength: z.number().int().positive().optional(),
  min: z.number().optional(),
  max: z.number().optional(),
});

const DefaultValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const FieldDescriptorSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  javaType: z.string().min(1),
  nullable: z.boolean().optional(),
  default_value: DefaultValueSchema.optional(),
  primaryKey: z.boolean().optional(),
  autoGenerated: z.boolean().optional(),
  updateOnModify: z.boolean().optional(),
  description: z.string().optional(),
  validation: ValidationSchema.optional(),
});

export const FieldChangesSchema = z.object({
  type: z.string().min(1).optional(),
  javaType: z.string().min(1).optional(),
  nullable: z.boolean().optional(),
  default_value: DefaultValueSchema.optional(),
  updateOnModify: z.boolean().optional(),
  description: z.string().optional(),
  validation: ValidationSchema.optional(),
});

const AddPayloadSchema = z.object({ field: FieldDescriptorSchema });
const UpdatePayloadSchema = z.object({ field_name: z.string().min(1), changes: FieldChangesSchema });
const RemovePayloadSchema = z.object({ field_name: z.string().min(1) });

function describeIssue(label: string, error: z.ZodError): string {
  const issue = error.issues[0];
  const attribute = issue.path.join('.');
  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return `${label} operation requires '${attribute}'`;
  }
  return `${label} operation has invalid '${attribute}': ${issue.message}`;
}

function parsePayload<T extends z.ZodTypeAny>(schema: T, label: string, payload: unknown): z.infer<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new RequestValidationError(describeIssue(label, result.error));
  }
  return result.data;
}

function isFieldAction(value: string): value is FieldAction {
  return (FIELD_ACTIONS as readonly string[]).includes(value);
}

/**
 * Build a field operation from its raw JSON payload.
 *
 * The action tag is case-insensitive. Throws RequestValidationError naming
 * the first missing or invalid attribute.
 */
export function createFieldOperation(payload: unknown): FieldOperation {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    throw new RequestValidationError('Field operation must be an object');
  }
  const rawAction = 'action' in payload ? payload.action : undefined;
  if (typeof rawAction !== 'string') {
    throw new RequestValidationError("Field operation requires 'action'");
  }

  const action = rawAction.toLowerCase();
  if (!isFieldAction(action)) {
    throw new RequestValidationError(`Invalid action: ${action}. Must be one of ${FIELD_ACTIONS.join(', ')}`);
  }

  switch (action) {
    case 'add': {
      const { field } = parsePayload(AddPayloadSchema, 'Add', payload);
      return { action, field };
    }
    case 'update': {
      const { field_name, changes } = parsePayload(UpdatePayloadSchema, 'Update', payload);
      return { action, fieldName: field_name, changes };
    }
    case 'remove': {
      const { field_name } = parsePayload(RemovePayloadSchema, 'Remove', payload);
      return { action, fieldName: field_name };
    }
  }
}

/** Name of the field an operation targets */
export function operationFieldName(operation: FieldOperation): string {
  return operation.action === 'add' ? operation.field.name : operation.fieldName;
}

export function hasDestructiveOperations(operations: readonly FieldOperation[]): boolean {
  return operations.some((op) => op.action === 'remove');
}
