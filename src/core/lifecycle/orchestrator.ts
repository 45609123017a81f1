/**
 * Lifecycle orchestrator
 *
 * Sequences create, read, update and delete of one resource kind with the
 * convergence waits each mutation needs:
 *
 * - create: remote create, wait for `available`, read back
 * - update: remote modify (only when mutable attributes changed), wait, read back
 * - delete: remote delete, wait for absence
 * - read: single lookup; absence tells the caller to drop its record
 */

import { getConvergenceConfigFromEnv, type ConvergenceConfig } from '../config/index.js';
import { createRefresh, waitForState } from '../convergence/index.js';
import { RemoteOperationError, ResourceNotFoundError } from '../errors.js';
import { getResourceLogger, type ConvergentLogger } from '../logging/index.js';
import { createLookup, matchesAbsence, type Lookup } from '../lookup/index.js';
import type {
  AbsentOutcome,
  LifecycleOperation,
  LifecycleOutcome,
  OperationOptions,
  OrchestratorOptions,
  PresentOutcome,
  ResourceDefinition,
  WaitDefinition,
} from './types.js';

export class LifecycleOrchestrator<TSpec, TSnapshot, TChanges> {
  private readonly lookup: Lookup<TSnapshot>;
  private readonly deletionLookup: Lookup<TSnapshot>;
  private readonly polling: ConvergenceConfig;
  private readonly logger: ConvergentLogger | undefined;

  constructor(
    private readonly definition: ResourceDefinition<TSpec, TSnapshot, TChanges>,
    options: OrchestratorOptions = {}
  ) {
    const describe = (parts: readonly string[]) => definition.describe(parts);
    this.lookup = createLookup({
      resourceKind: definition.kind,
      codec: definition.codec,
      describe,
      absence: definition.absence,
    });
    // Polls during a deletion wait tolerate only the `wait` signatures.
    this.deletionLookup = createLookup({
      resourceKind: definition.kind,
      codec: definition.codec,
      describe,
      absence: { describe: definition.absence.wait ?? definition.absence.describe },
    });
    this.polling = { ...getConvergenceConfigFromEnv(), ...options.polling };
    this.logger = options.logger;
  }

  get kind(): string {
    return this.definition.kind;
  }

  /**
   * Create the remote object and wait until it is available.
   *
   * When the wait fails, the rejection's `identifier` names the new object so
   * the caller can keep tracking it.
   */
  async create(spec: TSpec, options: OperationOptions = {}): Promise<PresentOutcome<TSnapshot>> {
    const desired = this.validate(spec);

    let parts: readonly string[];
    try {
      parts = await this.definition.create(desired);
    } catch (error) {
      throw new RemoteOperationError({ resourceKind: this.kind, operation: 'create' }, error);
    }

    const identifier = this.definition.codec.encode(parts);
    this.loggerFor(identifier).info('Created remote object');

    await this.awaitWait(this.definition.waits?.available, this.lookup, identifier, 'create', options);

    return this.readExisting(identifier, 'create');
  }

  /**
   * Look the object up once. An absent outcome means it was deleted out of
   * band and the caller should drop its record.
   */
  async read(identifier: string): Promise<LifecycleOutcome<TSnapshot>> {
    const result = await this.lookup.fetch(identifier);

    if (!result.found) {
      this.loggerFor(identifier).debug('Remote object not found, removing from state', {
        reason: result.reason,
      });
      return { status: 'absent', identifier };
    }

    return { status: 'present', identifier, snapshot: result.snapshot };
  }

  /**
   * Adopt an existing object by identifier. Unlike `read`, absence is an error.
   */
  async import(identifier: string): Promise<PresentOutcome<TSnapshot>> {
    return this.readExisting(identifier, 'import');
  }

  /**
   * Apply changes of mutable attributes. Without any, neither a modify call
   * nor a wait is issued.
   */
  async update(
    identifier: string,
    prior: TSpec,
    desired: TSpec,
    options: OperationOptions = {}
  ): Promise<LifecycleOutcome<TSnapshot>> {
    const next = this.validate(desired);
    const parts = this.definition.codec.decode(identifier);
    const changes = this.definition.diff(prior, next);

    if (changes === undefined) {
      this.loggerFor(identifier).debug('No mutable attributes changed');
      return this.read(identifier);
    }

    try {
      await this.definition.modify(parts, changes);
    } catch (error) {
      throw new RemoteOperationError({ resourceKind: this.kind, identifier, operation: 'modify' }, error);
    }
    this.loggerFor(identifier).info('Modified remote object', { changes });

    await this.awaitWait(this.definition.waits?.available, this.lookup, identifier, 'update', options);

    return this.read(identifier);
  }

  /**
   * Delete the object and wait until it is gone. An object that is already
   * gone counts as deleted.
   */
  async delete(identifier: string, options: OperationOptions = {}): Promise<AbsentOutcome> {
    const parts = this.definition.codec.decode(identifier);

    try {
      await this.definition.remove(parts);
    } catch (error) {
      if (matchesAbsence(error, this.definition.absence.delete)) {
        this.loggerFor(identifier).debug('Remote object already gone');
        return { status: 'absent', identifier };
      }
      throw new RemoteOperationError({ resourceKind: this.kind, identifier, operation: 'delete' }, error);
    }

    await this.awaitWait(
      this.definition.waits?.deleted,
      this.deletionLookup,
      identifier,
      'delete',
      options
    );

    this.loggerFor(identifier).info('Deleted remote object');
    return { status: 'absent', identifier };
  }

  /**
   * Logger bound to one remote object; an injected logger gets the same bindings
   */
  private loggerFor(identifier: string): ConvergentLogger {
    const context = { component: 'lifecycle-orchestrator' };
    return this.logger
      ? this.logger.child({ ...context, resourceKind: this.kind, resourceId: identifier })
      : getResourceLogger(this.kind, identifier, context);
  }

  private validate(spec: TSpec): TSpec {
    return this.definition.validate ? this.definition.validate(spec) : spec;
  }

  private async readExisting(
    identifier: string,
    operation: LifecycleOperation
  ): Promise<PresentOutcome<TSnapshot>> {
    const outcome = await this.read(identifier);
    if (outcome.status === 'absent') {
      throw new ResourceNotFoundError({ resourceKind: this.kind, identifier, operation });
    }
    return outcome;
  }

  private async awaitWait(
    wait: WaitDefinition | undefined,
    lookup: Lookup<TSnapshot>,
    identifier: string,
    operation: LifecycleOperation,
    options: OperationOptions
  ): Promise<void> {
    if (!wait) {
      this.loggerFor(identifier).debug('Resource kind is ready immediately, skipping wait', {
        operation,
      });
      return;
    }

    const result = await waitForState({
      context: { resourceKind: this.kind, identifier, operation },
      refresh: createRefresh(lookup, this.definition.extractStatus, identifier),
      pending: wait.pending,
      target: wait.target,
      timeout: options.timeout ?? wait.timeout ?? this.polling.timeout,
      initialInterval: this.polling.initialInterval,
      maxInterval: this.polling.maxInterval,
      backoffMultiplier: this.polling.backoffMultiplier,
      ...(options.signal && { signal: options.signal }),
      ...(options.onProgress && { onProgress: options.onProgress }),
    });

    this.loggerFor(identifier).debug('Wait finished', {
      operation,
      outcome: result.outcome,
      attempts: result.attempts,
      elapsed: result.elapsed,
    });
  }
}
