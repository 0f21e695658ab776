/**
 * Java source snippets for fields, accessors and validation annotations.
 *
 * Every annotation is emitted on a single line so the structure extractor
 * can read it back on a later run.
 */

import { exampleValue, importForJavaType, toCamelCase, toPascalCase, toTitle } from '../../utils/naming.js';
import type { FieldDescriptor, FieldValidation } from '../types.js';

export type DtoKind = 'request' | 'response';

export const INDENT = '    ';

const NUMERIC_TYPES = new Set(['BigDecimal', 'Integer', 'Long', 'Double', 'Float', 'Short']);

/** Annotation names the validation generator owns; replaced wholesale on update */
export const VALIDATION_ANNOTATIONS = ['NotNull', 'NotBlank', 'Size', 'DecimalMin', 'DecimalMax', 'Min', 'Max'];

export const CONSTRAINTS_PACKAGE = 'jakarta.validation.constraints';

function describe(field: { name: string; description?: string }): string {
  return field.description ?? field.name;
}

function javadoc(text: string, indent: string): string[] {
  return [`${indent}/**`, `${indent} * ${text}`, `${indent} */`];
}

function quote(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

export interface ValidationTarget {
  name: string;
  javaType: string;
  validation?: FieldValidation;
}

/**
 * Bean validation annotations for a field.
 * `blankCheck` adds @NotBlank to required String fields.
 */
export function validationAnnotations(target: ValidationTarget, indent = INDENT, blankCheck = false): string[] {
  const validation = target.validation ?? {};
  const title = toTitle(target.name);
  const lines: string[] = [];

  if (validation.required) {
    lines.push(`${indent}@NotNull(message = "${title} is required")`);
    if (blankCheck && target.javaType === 'String') {
      lines.push(`${indent}@NotBlank(message = "${title} cannot be blank")`);
    }
  }
  if (target.javaType === 'String' && validation.maxLength !== undefined) {
    lines.push(
      `${indent}@Size(max = ${validation.maxLength}, message = "${title} cannot exceed ${validation.maxLength} characters")`
    );
  }
  if (NUMERIC_TYPES.has(target.javaType)) {
    if (validation.min !== undefined) {
      lines.push(`${indent}@DecimalMin(value = "${validation.min}", message = "${title} must be at least ${validation.min}")`);
    }
    if (validation.max !== undefined) {
      lines.push(`${indent}@DecimalMax(value = "${validation.max}", message = "${title} must be at most ${validation.max}")`);
    }
  }

  return lines;
}

/** `@Column(...)` for an entity field */
export function columnAnnotation(
  field: { name: string; nullable?: boolean; validation?: FieldValidation },
  indent = INDENT
): string {
  const parts = [`name = "${field.name}"`];
  if (field.nullable === false) parts.push('nullable = false');
  if (field.validation?.maxLength !== undefined) parts.push(`length = ${field.validation.maxLength}`);
  return `${indent}@Column(${parts.join(', ')})`;
}

export function modelFieldLines(field: FieldDescriptor, indent = INDENT): string[] {
  const lines = javadoc(describe(field), indent);

  if (field.primaryKey) {
    lines.push(`${indent}@Id`);
    if (field.autoGenerated) {
      lines.push(`${indent}@GeneratedValue(strategy = GenerationType.IDENTITY)`);
    }
  }

  if (field.name === 'created_at' && field.autoGenerated) {
    lines.push(`${indent}@CreationTimestamp`);
  } else if (field.name === 'updated_at' && field.updateOnModify) {
    lines.push(`${indent}@UpdateTimestamp`);
  }

  lines.push(columnAnnotation(field, indent));
  lines.push(...validationAnnotations(field, indent));
  lines.push(`${indent}private ${field.javaType} ${toCamelCase(field.name)};`);
  return lines;
}

export function schemaAnnotation(field: FieldDescriptor, kind: DtoKind, indent = INDENT): string {
  const required = kind === 'request' && field.validation?.required === true;
  const parts = [`description = "${quote(describe(field))}"`, `required = ${required}`];
  if (field.validation?.maxLength !== undefined) parts.push(`maxLength = ${field.validation.maxLength}`);
  parts.push(`example = "${quote(exampleValue(field.javaType, field.name))}"`);
  return `${indent}@Schema(${parts.join(', ')})`;
}

export function dtoFieldLines(field: FieldDescriptor, kind: DtoKind, indent = INDENT): string[] {
  const lines = javadoc(describe(field), indent);
  lines.push(schemaAnnotation(field, kind, indent));
  lines.push(`${indent}@JsonProperty("${field.name}")`);
  if (kind === 'request') {
    lines.push(...validationAnnotations(field, indent, true));
  }
  lines.push(`${indent}private ${field.javaType} ${toCamelCase(field.name)};`);
  return lines;
}

/** Getter and setter, separated by a blank line */
export function accessorLines(
  field: { name: string; javaType: string; description?: string },
  indent = INDENT
): string[] {
  const camel = toCamelCase(field.name);
  const pascal = toPascalCase(field.name);
  const text = describe(field).toLowerCase();
  const body = indent + INDENT;

  return [
    `${indent}/**`,
    `${indent} * Get ${text}.`,
    `${indent} *`,
    `${indent} * @return ${text}`,
    `${indent} */`,
    `${indent}public ${field.javaType} get${pascal}() {`,
    `${body}return ${camel};`,
    `${indent}}`,
    '',
    `${indent}/**`,
    `${indent} * Set ${text}.`,
    `${indent} *`,
    `${indent} * @param ${camel} ${text}`,
    `${indent} */`,
    `${indent}public void set${pascal}(${field.javaType} ${camel}) {`,
    `${body}this.${camel} = ${camel};`,
    `${indent}}`,
  ];
}

/** Fully qualified names the given annotation and declaration lines need */
export function requiredImports(lines: readonly string[], javaType: string): string[] {
  const imports = new Set<string>();
  const typeImport = importForJavaType(javaType);
  if (typeImport) imports.add(typeImport);

  const text = lines.join('\n');
  for (const annotation of VALIDATION_ANNOTATIONS) {
    if (new RegExp(`@${annotation}\\b`).test(text)) {
      imports.add(`${CONSTRAINTS_PACKAGE}.${annotation}`);
    }
  }
  if (/@CreationTimestamp\b/.test(text)) imports.add('org.hibernate.annotations.CreationTimestamp');
  if (/@UpdateTimestamp\b/.test(text)) imports.add('org.hibernate.annotations.UpdateTimestamp');
  if (/@Schema\b/.test(text)) imports.add('io.swagger.v3.oas.annotations.media.Schema');
  if (/@JsonProperty\b/.test(text)) imports.add('com.fasterxml.jackson.annotation.JsonProperty');
  if (/@Column\b/.test(text)) imports.add('jakarta.persistence.Column');
  if (/@GeneratedValue\b/.test(text)) {
    imports.add('jakarta.persistence.GeneratedValue');
    imports.add('jakarta.persistence.GenerationType');
  }
  if (/@Id\b/.test(text)) imports.add('jakarta.persistence.Id');

  return Array.from(imports);
}
