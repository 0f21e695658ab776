/**
 * apply - Drive a field modification request from validation to commit
 *
 * validating → analyzed → safety-checked → (dry-run-reported | confirmed)
 *   → snapshotted → applying → (committed | rolled-back)
 *
 * Nothing on disk changes before the snapshot exists. Any error thrown while
 * applying restores it.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ResolvedConfig } from '../../core/config.js';
import type { Logger } from '../../core/logger.js';
import {
  ApplyFailure,
  LayerforgeError,
  RestoreFailure,
  SafetyViolation,
  UserCancelled,
  errorMessage,
  type ErrorCode,
} from '../../core/errors.js';
import { defaultRegistry, type ExtractorRegistry } from '../../parsers/index.js';
import { hasDestructiveOperations, operationFieldName } from '../field-operation.js';
import { ServiceLayout } from '../layout.js';
import { loadModifyRequest, parseModifyRequest } from '../request.js';
import { controllerNotes, testFileNotes } from '../rewriters/companions.js';
import { rewriteDto } from '../rewriters/dto.js';
import { rewriteEntity } from '../rewriters/entity.js';
import { renderInterfaceNotes } from '../rewriters/frontend.js';
import type { JavaSource } from '../rewriters/java-edits.js';
import { rewriteRepository } from '../rewriters/repository.js';
import { rewriteService } from '../rewriters/service.js';
import type {
  ApplierState,
  ConfirmationGate,
  FieldUsage,
  ModifyOutcome,
  ModifyOverrides,
  ModifyRequest,
  ModifyResult,
  ProgressCallback,
  RewriteResult,
} from '../types.js';
import { createInteractiveGate } from './confirmation.js';
import { checkFieldUsage } from './dependencies.js';
import { ImpactAnalyzer } from './impact.js';
import { MigrationGenerator } from './migration.js';
import { SafetyValidator } from './safety.js';
import { SnapshotManager } from './snapshot.js';

export interface OperationApplierOptions {
  config: ResolvedConfig;
  logger: Logger;
  /** Asked before anything is written unless the request is auto-confirmed */
  gate?: ConfirmationGate;
  registry?: ExtractorRegistry;
  snapshots?: SnapshotManager;
  onProgress?: ProgressCallback;
  now?: () => Date;
}

/** Mutable record of one run; frozen into a ModifyResult at the end */
class RunRecord {
  readonly states: ApplierState[] = ['validating'];
  readonly errors: string[] = [];
  readonly warnings: string[] = [];
  readonly notes: string[] = [];
  readonly changedFiles: string[] = [];
  analysis?: ModifyResult['analysis'];
  backupId?: string;
  migrationFile?: string;
  errorCode?: ErrorCode;

  enter(state: ApplierState): void {
    this.states.push(state);
  }

  /** Record a failure and end the run */
  fail(outcome: ModifyOutcome, error: LayerforgeError, messages: readonly string[] = [error.message]): ModifyResult {
    this.errorCode = error.code;
    this.errors.push(...messages);
    return this.finish(outcome);
  }

  finish(outcome: ModifyOutcome): ModifyResult {
    return {
      success: outcome === 'committed' || outcome === 'dry-run',
      outcome,
      states: [...this.states],
      analysis: this.analysis,
      backupId: this.backupId,
      migrationFile: this.migrationFile,
      errorCode: this.errorCode,
      changedFiles: [...this.changedFiles],
      errors: [...this.errors],
      warnings: [...this.warnings],
      notes: [...this.notes],
    };
  }
}

export class OperationApplier {
  private readonly config: ResolvedConfig;
  private readonly logger: Logger;
  private readonly gate: ConfirmationGate;
  private readonly registry: ExtractorRegistry;
  private readonly snapshots: SnapshotManager;
  private readonly analyzer: ImpactAnalyzer;
  private readonly validator: SafetyValidator;
  private readonly migrations: MigrationGenerator;
  private readonly now: () => Date;
  private readonly progress: ProgressCallback;

  constructor(options: OperationApplierOptions) {
    const { config, logger } = options;
    this.config = config;
    this.logger = logger;
    this.now = options.now ?? (() => new Date());
    this.gate = options.gate ?? createInteractiveGate();
    this.registry = options.registry ?? defaultRegistry;
    this.progress = options.onProgress ?? (() => {});
    this.snapshots =
      options.snapshots ??
      new SnapshotManager({
        projectRoot: config.projectRoot,
        snapshotDir: config.snapshotDir,
        basePackage: config.basePackage,
        logger,
        now: this.now,
      });
    this.analyzer = new ImpactAnalyzer(config.basePackage);
    this.validator = new SafetyValidator(logger);
    this.migrations = new MigrationGenerator({
      projectRoot: config.projectRoot,
      templatesDir: config.templatesDir,
      logger,
      now: this.now,
    });
  }

  /** Load an operations file and process it */
  async processFile(filePath: string, overrides: ModifyOverrides = {}): Promise<ModifyResult> {
    this.logger.info(`Processing field operations from: ${filePath}`);
    return this.run(() => loadModifyRequest(filePath), overrides);
  }

  /** Validate a raw operations payload and process it */
  async processPayload(payload: unknown, overrides: ModifyOverrides = {}): Promise<ModifyResult> {
    return this.run(() => parseModifyRequest(payload), overrides);
  }

  async process(request: ModifyRequest, overrides: ModifyOverrides = {}): Promise<ModifyResult> {
    return this.run(() => request, overrides);
  }

  private async run(load: () => ModifyRequest, overrides: ModifyOverrides): Promise<ModifyResult> {
    const record = new RunRecord();

    // validating
    this.progress('validation', 'Validating request');
    let request: ModifyRequest;
    try {
      request = load();
    } catch (error) {
      if (!(error instanceof LayerforgeError)) throw error;
      this.logger.error(error.message);
      return record.fail('invalid-request', error);
    }

    const { service, operations } = request;
    this.logger.info(`Service: ${service.name} (table ${service.table}), ${operations.length} operation(s)`);

    // analyzed
    this.progress('analysis', 'Analyzing impact');
    const analysis = this.analyzer.analyze(service, operations);
    record.analysis = analysis;
    record.enter('analyzed');
    for (const risk of analysis.risks) this.logger.warn(risk);

    // safety-checked
    this.progress('safety', 'Running safety checks');
    const violations = this.validator.validateAll(operations, service, this.config.projectRoot);
    if (violations.length > 0) {
      for (const violation of violations) this.logger.error(violation);
      return record.fail('unsafe', new SafetyViolation(violations), violations);
    }
    record.enter('safety-checked');

    if (overrides.dryRun ?? request.options.dryRun) {
      record.enter('dry-run-reported');
      this.logger.info('Dry run - no changes made');
      return record.finish('dry-run');
    }

    // confirmed
    if (!(overrides.autoConfirm ?? request.options.autoConfirm)) {
      const usages: FieldUsage[] = operations
        .filter((op) => op.action !== 'add')
        .map((op) =>
          checkFieldUsage(service, operationFieldName(op), {
            projectRoot: this.config.projectRoot,
            basePackage: this.config.basePackage,
            logger: this.logger,
          })
        );

      let confirmed: boolean;
      try {
        confirmed = await this.gate(analysis, { destructive: hasDestructiveOperations(operations), usages });
      } catch (error) {
        return record.fail('cancelled', new UserCancelled(`Confirmation failed: ${errorMessage(error)}`));
      }
      if (!confirmed) {
        const cancelled = new UserCancelled();
        this.logger.info(cancelled.message);
        return record.fail('cancelled', cancelled);
      }
    }
    record.enter('confirmed');

    // snapshotted
    this.progress('snapshot', 'Creating snapshot');
    let backupId: string;
    try {
      backupId = this.snapshots.createSnapshot(service.name);
    } catch (error) {
      if (!(error instanceof LayerforgeError)) throw error;
      return record.fail('snapshot-failed', error);
    }
    record.enter('snapshotted');

    // applying
    record.backupId = backupId;
    record.enter('applying');
    try {
      this.applyAll(request, record);
    } catch (error) {
      const failure =
        error instanceof ApplyFailure
          ? error
          : new ApplyFailure(`Failed to apply field operations: ${errorMessage(error)}`, { cause: error });
      this.logger.error(failure.message);
      record.changedFiles.length = 0;
      record.migrationFile = undefined;

      this.progress('rollback', 'Restoring snapshot');
      if (this.snapshots.restoreSnapshot(backupId)) {
        this.logger.info(`Changes rolled back from snapshot ${backupId}`);
        record.enter('rolled-back');
        return record.fail('rolled-back', failure);
      }

      const restoreFailure = new RestoreFailure(
        backupId,
        `Restore of snapshot ${backupId} failed; the project may be partially modified`,
        { cause: failure }
      );
      this.logger.critical(restoreFailure.message);
      return record.fail('restore-failed', restoreFailure, [failure.message, restoreFailure.message]);
    }

    record.enter('committed');
    this.progress('done', 'Done');
    this.logger.success('Field modification completed successfully');
    this.logger.info(`Snapshot available: ${backupId}`);
    return record.finish('committed');
  }

  private applyAll(request: ModifyRequest, record: RunRecord): void {
    const { service, operations } = request;
    const layout = new ServiceLayout(service, this.config.basePackage);

    this.progress('migration', 'Generating migration file');
    const migration = this.migrations.generate(service, operations);
    if (migration) {
      record.migrationFile = migration.file;
      record.changedFiles.push(migration.file);
    } else {
      record.warnings.push('Migration template not found, skipping migration generation');
    }

    const rewrites: Array<[string, string, (source: JavaSource) => RewriteResult]> = [
      ['model', layout.entity, (source) => rewriteEntity(source, operations)],
      ['request DTO', layout.requestDto, (source) => rewriteDto(source, operations, 'request')],
      ['response DTO', layout.responseDto, (source) => rewriteDto(source, operations, 'response')],
      ['service', layout.serviceClass, (source) => rewriteService(source, operations, service)],
      ['repository', layout.repository, (source) => rewriteRepository(source, operations, service)],
    ];

    rewrites.forEach(([label, file, rewrite], index) => {
      this.progress('rewrite', `Updating ${label} file`, index + 1, rewrites.length);
      this.rewriteJava(label, file, layout, rewrite, record);
    });

    this.progress('rewrite', 'Reviewing controller and test files');
    this.collectNotes(layout.controller, layout, record, (name, content) =>
      controllerNotes(name, content, operations)
    );
    this.collectNotes(layout.serviceTest, layout, record, (name, content) => testFileNotes(name, content, operations));
    this.collectNotes(layout.controllerTest, layout, record, (name, content) =>
      testFileNotes(name, content, operations)
    );

    this.progress('rewrite', 'Writing frontend interface notes');
    const interfaceNotes = renderInterfaceNotes(service, operations, this.now());
    if (interfaceNotes !== undefined) {
      const target = layout.resolve(this.config.projectRoot, layout.frontendInterfaceNotes);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, interfaceNotes, 'utf-8');
      record.changedFiles.push(layout.frontendInterfaceNotes);
      this.logger.success(`Frontend interface updates written: ${layout.frontendInterfaceNotes}`);
    } else {
      this.logger.debug('No frontend interface updates needed');
    }
  }

  /**
   * Missing or unparsable files are warnings; failing to read or write one
   * aborts the run.
   */
  private rewriteJava(
    label: string,
    file: string,
    layout: ServiceLayout,
    rewrite: (source: JavaSource) => RewriteResult,
    record: RunRecord
  ): void {
    const absolute = layout.resolve(this.config.projectRoot, file);
    const extracted = this.registry.extractFile(absolute);

    if (!extracted.ok) {
      if (extracted.error.kind === 'unreadable') {
        throw new ApplyFailure(`Failed to read ${label} file ${file}: ${extracted.error.message}`);
      }
      const warning =
        extracted.error.kind === 'not-found'
          ? `${capitalizeLabel(label)} file not found: ${file}`
          : `Could not parse ${label} file ${file}: ${extracted.error.message}`;
      this.logger.warn(warning);
      record.warnings.push(warning);
      return;
    }

    const result = rewrite({ content: extracted.content, structure: extracted.structure });
    record.notes.push(...result.notes);

    if (!result.changed) {
      this.logger.debug(`No ${label} changes needed`);
      return;
    }

    fs.writeFileSync(absolute, result.content, 'utf-8');
    record.changedFiles.push(file);
    this.logger.success(`Updated ${label} file: ${path.basename(file)}`);
  }

  private collectNotes(
    file: string,
    layout: ServiceLayout,
    record: RunRecord,
    review: (name: string, content: string) => string[]
  ): void {
    const absolute = layout.resolve(this.config.projectRoot, file);
    if (!fs.existsSync(absolute)) {
      this.logger.debug(`Skipping review of missing file ${file}`);
      return;
    }
    const notes = review(path.basename(file, '.java'), fs.readFileSync(absolute, 'utf-8'));
    record.notes.push(...notes);
  }
}

function capitalizeLabel(label: string): string {
  return label.charAt(0).toUpperCase() + label.slice(1);
}
