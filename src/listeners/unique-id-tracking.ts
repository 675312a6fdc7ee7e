/**
 * Unique id tracking listener.
 *
 * Records the unique id of every test (leaf) node that finished, whatever
 * its result, and writes them one per line when the session ends. Skipped
 * tests never finish and are therefore absent. The output lets a build
 * audit which tests actually ran across a history of runs.
 *
 * Disabled by default. When disabled the listener neither accumulates nor
 * touches the file system, so it is safe to register unconditionally.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { Configuration, TrackingConfig, resolveTrackingConfig } from '../config/configuration';
import { ListenerError, trackingIoError } from '../domain/errors';
import { TestIdentifier, isTest } from '../domain/node';
import { ExecutionResult } from '../domain/result';
import { BaseExecutionListener } from '../engine/listener';
import { listenerLogger } from '../logger';

const log = listenerLogger('UniqueIdTrackingListener');

export class UniqueIdTrackingListener extends BaseExecutionListener {
  readonly name = 'UniqueIdTrackingListener';
  readonly enabled: boolean;
  readonly outputPath: string;
  private uniqueIds: string[] = [];
  private written = false;

  constructor(config: Configuration | TrackingConfig) {
    super();
    const tracking = 'get' in config ? resolveTrackingConfig(config) : config;
    this.enabled = tracking.enabled;
    this.outputPath = join(tracking.outputDir, tracking.fileName);
  }

  onFinished(testIdentifier: TestIdentifier, _result: ExecutionResult): void {
    if (!this.enabled || !isTest(testIdentifier)) return;
    this.uniqueIds.push(testIdentifier.uniqueId.toString());
  }

  sessionFinished(): void {
    if (this.written) return;
    this.flush();
  }

  /**
   * Write the collected ids, overwriting the output file. Called on session
   * end; may be called again after a failed write. No-op when disabled.
   */
  flush(): void {
    if (!this.enabled) return;
    this.writeUniqueIds();
    this.written = true;
  }

  /** Ids collected so far, in completion order. Kept even when the write fails. */
  getUniqueIds(): string[] {
    return [...this.uniqueIds];
  }

  private writeUniqueIds(): void {
    const content = this.uniqueIds.map((id) => `${id}\n`).join('');
    try {
      mkdirSync(dirname(this.outputPath), { recursive: true });
      writeFileSync(this.outputPath, content, { encoding: 'utf8' });
    } catch (err) {
      throw new ListenerError(trackingIoError(this.outputPath, err));
    }
    log.info('Wrote unique ids', { path: this.outputPath, count: this.uniqueIds.length });
  }
}
