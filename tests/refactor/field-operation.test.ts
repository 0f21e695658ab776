import { describe, it, expect } from 'vitest';
import {
  createFieldOperation,
  hasDestructiveOperations,
  operationFieldName,
} from '../../src/refactor/field-operation.js';
import { RequestValidationError } from '../../src/core/errors.js';

describe('createFieldOperation', () => {
  it('builds an add operation from a full descriptor', () => {
    const op = createFieldOperation({
      action: 'add',
      field: { name: 'discount_rate', type: 'DECIMAL(5,2)', javaType: 'BigDecimal', nullable: false },
    });

    expect(op).toEqual({
      action: 'add',
      field: { name: 'discount_rate', type: 'DECIMAL(5,2)', javaType: 'BigDecimal', nullable: false },
    });
  });

  it('builds update and remove operations with camelCase field names', () => {
    const update = createFieldOperation({ action: 'update', field_name: 'title', changes: { type: 'VARCHAR(300)' } });
    expect(update).toEqual({ action: 'update', fieldName: 'title', changes: { type: 'VARCHAR(300)' } });

    const remove = createFieldOperation({ action: 'remove', field_name: 'legacy_code' });
    expect(remove).toEqual({ action: 'remove', fieldName: 'legacy_code' });
  });

  it('accepts action tags in any case', () => {
    const op = createFieldOperation({ action: 'REMOVE', field_name: 'notes' });
    expect(op.action).toBe('remove');
  });

  it('names the missing attribute', () => {
    expect(() =>
      createFieldOperation({ action: 'add', field: { name: 'discount_rate', type: 'DECIMAL(5,2)' } })
    ).toThrow("Add operation requires 'field.javaType'");

    expect(() => createFieldOperation({ action: 'update', field_name: 'title' })).toThrow(
      "Update operation requires 'changes'"
    );

    expect(() => createFieldOperation({ action: 'remove' })).toThrow("Remove operation requires 'field_name'");
  });

  it('rejects unknown actions', () => {
    expect(() => createFieldOperation({ action: 'rename', field_name: 'title' })).toThrow(
      'Invalid action: rename. Must be one of add, update, remove'
    );
  });

  it('throws RequestValidationError for non-object payloads', () => {
    expect(() => createFieldOperation('add')).toThrow(RequestValidationError);
    expect(() => createFieldOperation({ field_name: 'title' })).toThrow("Field operation requires 'action'");
  });
});

describe('operation helpers', () => {
  it('returns the targeted field name', () => {
    expect(
      operationFieldName({ action: 'add', field: { name: 'notes', type: 'TEXT', javaType: 'String' } })
    ).toBe('notes');
    expect(operationFieldName({ action: 'remove', fieldName: 'legacy_code' })).toBe('legacy_code');
  });

  it('flags requests that remove fields as destructive', () => {
    expect(hasDestructiveOperations([{ action: 'update', fieldName: 'title', changes: {} }])).toBe(false);
    expect(
      hasDestructiveOperations([
        { action: 'update', fieldName: 'title', changes: {} },
        { action: 'remove', fieldName: 'legacy_code' },
      ])
    ).toBe(true);
  });
});
