import * as path from 'node:path';
import { capitalize } from '../utils/naming.js';
import type { ServiceInfo } from './types.js';

const MAIN_JAVA = 'src/main/java';
const TEST_JAVA = 'src/test/java';
export const MIGRATION_DIR = 'src/main/resources/db/migration';
export const FRONTEND_DIR = 'src/main/resources/frontend';
export const FRONTEND_API_DIR = `${FRONTEND_DIR}/api`;

/**
 * Build an immutable ServiceInfo; the entity defaults to the capitalized service name.
 */
export function createServiceInfo(input: {
  name: string;
  table: string;
  entity?: string;
  description?: string;
}): ServiceInfo {
  return Object.freeze({
    name: input.name,
    table: input.table,
    entity: input.entity ?? capitalize(input.name),
    ...(input.description !== undefined ? { description: input.description } : {}),
  });
}

/** Directories captured by a snapshot of a service */
export function snapshotRootsFor(serviceName: string, basePackage: string): string[] {
  const packagePath = basePackage.split('.').join('/');
  return [
    `${MAIN_JAVA}/${packagePath}/${serviceName}`,
    `${TEST_JAVA}/${packagePath}/${serviceName}`,
    FRONTEND_API_DIR,
    MIGRATION_DIR,
  ];
}

/**
 * Conventional project-relative paths of every artifact generated for a service.
 * Paths always use forward slashes.
 */
export class ServiceLayout {
  readonly packagePath: string;

  constructor(
    readonly service: ServiceInfo,
    readonly basePackage: string
  ) {
    this.packagePath = basePackage.split('.').join('/');
  }

  get mainTree(): string {
    return `${MAIN_JAVA}/${this.packagePath}/${this.service.name}`;
  }

  get testTree(): string {
    return `${TEST_JAVA}/${this.packagePath}/${this.service.name}`;
  }

  get entity(): string {
    return `${this.mainTree}/model/${this.service.entity}.java`;
  }

  get requestDto(): string {
    return `${this.mainTree}/dto/${this.service.entity}Request.java`;
  }

  get responseDto(): string {
    return `${this.mainTree}/dto/${this.service.entity}Response.java`;
  }

  get serviceClass(): string {
    return `${this.mainTree}/service/${this.service.entity}Service.java`;
  }

  get repository(): string {
    return `${this.mainTree}/repository/${this.service.entity}Repository.java`;
  }

  get controller(): string {
    return `${this.mainTree}/controller/${this.service.entity}Controller.java`;
  }

  get serviceTest(): string {
    return `${this.testTree}/service/${this.service.entity}ServiceTest.java`;
  }

  get controllerTest(): string {
    return `${this.testTree}/controller/${this.service.entity}ControllerTest.java`;
  }

  get frontendApi(): string {
    return `${FRONTEND_API_DIR}/${this.service.entity.toLowerCase()}ApiService.js`;
  }

  get frontendInterfaceNotes(): string {
    return `${FRONTEND_API_DIR}/${this.service.entity}_interface_updates.txt`;
  }

  /** Files that depend on the service's fields, in a fixed order */
  dependentFiles(): string[] {
    return [
      this.entity,
      this.requestDto,
      this.responseDto,
      this.serviceClass,
      this.repository,
      this.controller,
      this.serviceTest,
      this.controllerTest,
      this.frontendApi,
    ];
  }

  resolve(projectRoot: string, relativePath: string): string {
    return path.join(projectRoot, ...relativePath.split('/'));
  }
}
