/**
 * Naming and type-mapping helpers shared by the analyzers and rewriters.
 */

/** Upper-case the first letter and lower-case the rest ("order_item" → "Order_item") */
export function capitalize(word: string): string {
  if (!word) return word;
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export function upperFirst(word: string): string {
  return word ? word.charAt(0).toUpperCase() + word.slice(1) : word;
}

/** "discount_rate" → "discountRate"; camelCase input is returned unchanged */
export function toCamelCase(name: string): string {
  const [first, ...rest] = name.split('_').filter(Boolean);
  if (first === undefined) return name;
  return first + rest.map(capitalize).join('');
}

/** "discount_rate" → "DiscountRate" */
export function toPascalCase(name: string): string {
  return upperFirst(toCamelCase(name));
}

/** "discount_rate" → "Discount Rate" */
export function toTitle(name: string): string {
  return name
    .split('_')
    .filter(Boolean)
    .map(capitalize)
    .join(' ');
}

/** "discount_rate" → "discount rate" */
export function toWords(name: string): string {
  return name.replace(/_/g, ' ');
}

const SQL_TO_JAVA: Record<string, string> = {
  BIGSERIAL: 'Long',
  BIGINT: 'Long',
  SERIAL: 'Integer',
  INTEGER: 'Integer',
  INT: 'Integer',
  SMALLINT: 'Integer',
  DECIMAL: 'BigDecimal',
  NUMERIC: 'BigDecimal',
  VARCHAR: 'String',
  CHAR: 'String',
  TEXT: 'String',
  TIMESTAMP: 'LocalDateTime',
  DATE: 'LocalDate',
  BOOLEAN: 'Boolean',
};

/** Map a SQL column type ("DECIMAL(5,2)") to a Java type; unknown types map to String */
export function sqlToJavaType(sqlType: string): string {
  const base = sqlType.split('(')[0].trim().toUpperCase();
  return SQL_TO_JAVA[base] ?? 'String';
}

const JAVA_TO_TS: Record<string, string> = {
  String: 'string',
  Boolean: 'boolean',
  Integer: 'number',
  Long: 'number',
  BigDecimal: 'number',
  LocalDateTime: 'string',
  LocalDate: 'string',
};

export function javaToTypeScriptType(javaType: string): string {
  return JAVA_TO_TS[javaType] ?? 'unknown';
}

/** Fully-qualified imports needed by the non-java.lang types we generate */
const JAVA_TYPE_IMPORTS: Record<string, string> = {
  BigDecimal: 'java.math.BigDecimal',
  LocalDateTime: 'java.time.LocalDateTime',
  LocalDate: 'java.time.LocalDate',
  UUID: 'java.util.UUID',
};

export function importForJavaType(javaType: string): string | undefined {
  return JAVA_TYPE_IMPORTS[javaType];
}

/** Example value used in OpenAPI annotations */
export function exampleValue(javaType: string, fieldName: string): string {
  switch (javaType) {
    case 'String':
      return `Sample ${toWords(fieldName)}`;
    case 'BigDecimal':
      return '100.50';
    case 'Integer':
    case 'Long':
      return '1';
    case 'Boolean':
      return 'true';
    case 'LocalDateTime':
      return '2024-01-15T10:30:00';
    case 'LocalDate':
      return '2024-01-15';
    default:
      return 'sample';
  }
}

/** Java expression used as test data for a field */
export function testValue(javaType: string, fieldName: string): string {
  switch (javaType) {
    case 'String':
      return `"test_${fieldName}"`;
    case 'Boolean':
      return 'true';
    case 'Integer':
      return '1';
    case 'Long':
      return '1L';
    case 'BigDecimal':
      return 'new BigDecimal("100.00")';
    case 'LocalDateTime':
      return 'LocalDateTime.now()';
    case 'LocalDate':
      return 'LocalDate.now()';
    default:
      return 'null';
  }
}

export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
