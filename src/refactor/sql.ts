import type { DefaultValue, FieldChanges, FieldDescriptor } from './types.js';

const SQL_LITERAL = /^(?:-?\d+(?:\.\d+)?|TRUE|FALSE|NULL|CURRENT_(?:TIMESTAMP|DATE|TIME)|NOW\(\)|'.*')$/i;

/**
 * Render a default value as a SQL literal. Numbers, booleans, already-quoted
 * strings and well-known SQL expressions pass through; other strings are quoted.
 */
export function sqlDefault(value: DefaultValue): string {
  if (value === null) return 'NULL';
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (typeof value === 'number') return String(value);
  if (SQL_LITERAL.test(value.trim())) return value.trim();
  return `'${value.replace(/'/g, "''")}'`;
}

export function addColumnStatement(table: string, field: FieldDescriptor): string {
  let statement = `ALTER TABLE ${table} ADD COLUMN ${field.name} ${field.type}`;
  if (field.nullable === false) statement += ' NOT NULL';
  if (field.default_value !== undefined) statement += ` DEFAULT ${sqlDefault(field.default_value)}`;
  return `${statement};`;
}

export function alterTypeStatement(table: string, fieldName: string, type: string): string {
  return `ALTER TABLE ${table} ALTER COLUMN ${fieldName} TYPE ${type};`;
}

export function alterNullabilityStatement(table: string, fieldName: string, nullable: boolean): string {
  return `ALTER TABLE ${table} ALTER COLUMN ${fieldName} ${nullable ? 'DROP' : 'SET'} NOT NULL;`;
}

export function alterDefaultStatement(table: string, fieldName: string, value: DefaultValue): string {
  return value === null
    ? `ALTER TABLE ${table} ALTER COLUMN ${fieldName} DROP DEFAULT;`
    : `ALTER TABLE ${table} ALTER COLUMN ${fieldName} SET DEFAULT ${sqlDefault(value)};`;
}

/** Never executable: dropping a column needs a human decision */
export function dropColumnStatement(table: string, fieldName: string): string {
  return `-- ALTER TABLE ${table} DROP COLUMN ${fieldName}; -- REQUIRES MANUAL CONFIRMATION`;
}

/** All statements an update produces, in execution order */
export function updateStatements(table: string, fieldName: string, changes: FieldChanges): string[] {
  const statements: string[] = [];
  if (changes.type !== undefined) statements.push(alterTypeStatement(table, fieldName, changes.type));
  if (changes.nullable !== undefined) statements.push(alterNullabilityStatement(table, fieldName, changes.nullable));
  if (changes.default_value !== undefined) statements.push(alterDefaultStatement(table, fieldName, changes.default_value));
  return statements;
}
